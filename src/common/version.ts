import { readFileSync } from "node:fs";
import * as v from "valibot";

const PackageJsonSchema = v.object({
  name: v.string(),
  version: v.string(),
});

let cached: v.InferOutput<typeof PackageJsonSchema> | undefined;

// Resolves to the package root both from src/common and from dist/common.
export function packageInfo(): v.InferOutput<typeof PackageJsonSchema> {
  if (!cached) {
    const content = readFileSync(new URL("../../package.json", import.meta.url), "utf-8");
    cached = v.parse(PackageJsonSchema, JSON.parse(content));
  }
  return cached;
}
