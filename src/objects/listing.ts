import { ListObjectsV2Command, type _Object, type CommonPrefix } from "@aws-sdk/client-s3";
import { BackendOperationError } from "../common/errors.js";
import { PATH_DELIMITER, type ListingEntry } from "../common/types.js";
import type { StoreConfig } from "../config/storeConfig.js";
import { withS3Client } from "../s3/s3Session.js";

// Stripping goes by prefix length, not by path segment. A prefix that does not
// end on a delimiter leaves partial segment names behind ("a/fo" turns
// "a/foo.txt" into "o.txt").
function toEntry(fullPath: string | undefined, prefix: string, isDirectory: boolean) {
  const path = (fullPath ?? "").slice(prefix.length);
  return path ? { path, isDirectory } : undefined;
}

/**
 * Reclassifies one delimiter-grouped listing page into files and
 * sub-directories relative to `prefix`. Files come first.
 */
export function toListingEntries(
  prefix: string,
  contents: readonly _Object[] | undefined,
  commonPrefixes: readonly CommonPrefix[] | undefined,
): ListingEntry[] {
  const entries: ListingEntry[] = [];
  for (const obj of contents ?? []) {
    const entry = toEntry(obj.Key, prefix, false);
    if (entry) entries.push(entry);
  }
  for (const commonPrefix of commonPrefixes ?? []) {
    const entry = toEntry(commonPrefix.Prefix, prefix, true);
    if (entry) entries.push(entry);
  }
  return entries;
}

export async function listDirectory(
  config: StoreConfig,
  bucket: string,
  prefix?: string,
): Promise<ListingEntry[]> {
  const effectivePrefix = prefix ?? "";

  return withS3Client(config, async (client) => {
    const output = await client
      .send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: effectivePrefix,
          Delimiter: PATH_DELIMITER,
        }),
      )
      .catch((err: unknown) => {
        throw new BackendOperationError("listObjects", err);
      });
    return toListingEntries(effectivePrefix, output.Contents, output.CommonPrefixes);
  });
}
