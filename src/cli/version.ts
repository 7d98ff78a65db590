import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const pkg = require("../../package.json") as { version: string };

export function getVersion(): string {
  return pkg.version;
}

export function versionCommand(): void {
  console.log(`wasmedge-env v${getVersion()}`);
}
