import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const serviceDir = path.dirname(fileURLToPath(import.meta.url));

let packageRoot: string | null = null;

// Sources run from services/, builds from dist/services/; both sit below package.json.
function findPackageRoot(): string {
  let current = serviceDir;
  for (;;) {
    if (fs.existsSync(path.join(current, "package.json"))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return path.resolve(serviceDir, "..");
    }
    current = parent;
  }
}

export function resolvePackagePath(...segments: string[]): string {
  if (packageRoot === null) {
    packageRoot = findPackageRoot();
  }
  return path.join(packageRoot, ...segments);
}
