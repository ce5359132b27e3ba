import { DuplicateModuleError, UnknownModuleError } from "./errors";
import { defaultModules } from "./modules";
import type { CryptoModule } from "./modules/types";

/**
 * Ordered, immutable-once-built set of detection modules
 */
export class ModuleRegistry {
  private readonly modules: CryptoModule[] = [];
  private readonly names = new Set<string>();

  constructor(modules: readonly CryptoModule[] = []) {
    for (const module of modules) {
      this.register(module);
    }
  }

  register(module: CryptoModule): void {
    if (this.names.has(module.name)) {
      throw new DuplicateModuleError(module.name);
    }
    this.names.add(module.name);
    this.modules.push(module);
  }

  allModules(): readonly CryptoModule[] {
    return this.modules;
  }

  get(name: string): CryptoModule | undefined {
    return this.modules.find((m) => m.name === name);
  }

  get size(): number {
    return this.modules.length;
  }
}

export interface CreateRegistryOptions {
  /** Restrict to these module names; empty or missing means all */
  only?: string[];
  modules?: readonly CryptoModule[];
}

/**
 * Builds a registry from the default modules, optionally restricted by name.
 * Default registration order is kept either way.
 */
export function createRegistry(options: CreateRegistryOptions = {}): ModuleRegistry {
  const available = options.modules ?? defaultModules;
  const only = options.only ?? [];

  if (only.length === 0) {
    return new ModuleRegistry(available);
  }

  const wanted = new Set(only);
  for (const name of wanted) {
    if (!available.some((m) => m.name === name)) {
      throw new UnknownModuleError(name);
    }
  }
  return new ModuleRegistry(available.filter((m) => wanted.has(m.name)));
}
