import fs from "fs-extra";
import { fileURLToPath } from "url";

export async function packageVersion(): Promise<string> {
  const pkgPath = fileURLToPath(new URL("../../package.json", import.meta.url));
  const pkg: unknown = await fs.readJson(pkgPath);
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}
