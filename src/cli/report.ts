import pc from "picocolors";
import type {
  DetectionResult,
  HashcatCandidate,
  ProductIdentified,
  SecretFound,
} from "../secrets/modules/types";

export type Colors = Pick<typeof pc, "bold" | "green" | "red" | "yellow" | "cyan" | "dim">;

export const NO_SECRETS_FOUND = "No secrets found :(";

function header(result: DetectionResult, title: string, colors: Colors): string[] {
  return [
    "***********************",
    title,
    "",
    `Detecting Module: ${colors.cyan(result.detectingModule)}`,
    "",
    `Product Type: ${result.description.product}`,
    `Product: ${result.product}`,
    `Secret Type: ${result.description.secret}`,
    `Location: ${result.location}`,
  ];
}

export function formatHashcat(candidates: HashcatCandidate[], colors: Colors): string[] {
  return [
    "",
    "Potential matching hashcat commands:",
    "",
    ...candidates.map(
      (hc) =>
        `Module: [${hc.detectingModule}] ${hc.hashcatDescription} Command: [${colors.dim(hc.hashcatCommand)}]`,
    ),
  ];
}

export function formatSecretFound(result: SecretFound, colors: Colors): string[] {
  return [
    ...header(result, colors.bold(colors.red("Known Secret Found!")), colors),
    `Secret: ${colors.bold(result.secret)}`,
    `Details: ${JSON.stringify(result.details)}`,
  ];
}

export function formatProductIdentified(result: ProductIdentified, colors: Colors): string[] {
  const lines = header(
    result,
    colors.yellow("Cryptographic Product Identified (no vulnerability)"),
    colors,
  );
  if (result.hashcat && result.hashcat.length > 0) {
    lines.push(...formatHashcat(result.hashcat, colors));
  }
  return lines;
}

export function formatResult(result: DetectionResult, colors: Colors): string[] {
  return result.type === "SecretFound"
    ? formatSecretFound(result, colors)
    : formatProductIdentified(result, colors);
}
