import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PackageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});
export type PackageInfo = z.infer<typeof PackageInfoSchema>;

let cached: PackageInfo | undefined;

// package.json sits one level above src/ and two above dist/src/.
export function packageInfo(): PackageInfo {
  if (cached) {
    return cached;
  }
  const here = dirname(fileURLToPath(import.meta.url));
  const path = [join(here, "..", "package.json"), join(here, "..", "..", "package.json")].find((candidate) =>
    existsSync(candidate),
  );
  if (!path) {
    throw new Error(`package.json not found near ${here}`);
  }
  cached = PackageInfoSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
  return cached;
}
