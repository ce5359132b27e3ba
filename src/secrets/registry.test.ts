import { describe, expect, test } from "vitest";
import { DuplicateModuleError, UnknownModuleError } from "./errors";
import { defaultModules } from "./modules";
import { jwtModule } from "./modules/jwt";
import { createRegistry, ModuleRegistry } from "./registry";

describe("createRegistry", () => {
  test("registers every default module in order", () => {
    expect(createRegistry().allModules().map((m) => m.name)).toEqual([
      "Generic_JWT",
      "Flask_SignedCookies",
      "Django_SignedCookies",
      "Express_SignedCookies_ES",
      "Express_SignedCookies_CS",
      "Laravel_SignedCookies",
      "Rails_SecretKeyBase",
    ]);
  });

  test("keeps registration order when restricted", () => {
    const registry = createRegistry({ only: ["Rails_SecretKeyBase", "Generic_JWT"] });
    expect(registry.allModules().map((m) => m.name)).toEqual(["Generic_JWT", "Rails_SecretKeyBase"]);
    expect(registry.size).toBe(2);
  });

  test("treats an empty restriction as all modules", () => {
    expect(createRegistry({ only: [] }).size).toBe(defaultModules.length);
  });

  test("rejects unknown module names", () => {
    expect(() => createRegistry({ only: ["Spring_Boot"] })).toThrow(UnknownModuleError);
    expect(() => createRegistry({ only: ["Spring_Boot"] })).toThrow("Unknown module 'Spring_Boot'");
  });
});

describe("ModuleRegistry", () => {
  test("rejects duplicate names", () => {
    const registry = new ModuleRegistry([jwtModule]);
    expect(() => registry.register(jwtModule)).toThrow(DuplicateModuleError);
  });

  test("looks modules up by name", () => {
    const registry = createRegistry();
    expect(registry.get("Generic_JWT")).toBe(jwtModule);
    expect(registry.get("generic_jwt")).toBeUndefined();
  });
});
