import fs from "fs";
import path from "path";
import { Logger } from "pino";

const PACKAGE_JSON_PATH = path.join(__dirname, "..", "..", "package.json");

export function getPackageVersion(logger: Logger): string {
  try {
    const packageJson: unknown = JSON.parse(fs.readFileSync(PACKAGE_JSON_PATH, "utf-8"));
    if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson) {
      return String(packageJson.version);
    }
    return "unknown";
  } catch (error) {
    logger.error({ err: error }, "Failed to read package.json version");
    return "unknown";
  }
}
