import { readFileSync } from "fs";
import { z } from "zod";

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export type PackageInfo = z.infer<typeof PackageJsonSchema>;

/**
 * Read name and version from the package.json next to src/ and dist/.
 */
export function readPackageInfo(
  url: URL = new URL("../../package.json", import.meta.url)
): PackageInfo {
  return PackageJsonSchema.parse(JSON.parse(readFileSync(url, "utf-8")));
}
