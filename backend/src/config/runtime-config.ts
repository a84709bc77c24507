import type { ConfigDocument } from "./schemas";

// Set once by bootstrap (or a test) before the Nest container resolves RuntimeConfigService.
let runtimeConfig: ConfigDocument | null = null;

export function setRuntimeConfig(document: ConfigDocument): void {
  runtimeConfig = document;
}

export function getRuntimeConfig(): ConfigDocument | null {
  return runtimeConfig;
}

export function clearRuntimeConfig(): void {
  runtimeConfig = null;
}
