import * as v from "valibot";
import { ValidationError } from "./errors.js";

const RequiredString = (name: string) =>
  v.pipe(v.string(`${name} is required`), v.nonEmpty(`${name} must not be empty`));

export const ObjectQuerySchema = v.object({
  bucket: RequiredString("bucket"),
  path: RequiredString("path"),
});

export const ListObjectsQuerySchema = v.object({
  bucket: RequiredString("bucket"),
  prefix: v.optional(v.string("prefix must be a single string")),
});

const BooleanFlag = (name: string) =>
  v.pipe(
    v.optional(v.picklist(["true", "false"], `${name} must be "true" or "false"`), "false"),
    v.transform((value) => value === "true"),
  );

export const SignQuerySchema = v.object({
  bucket: RequiredString("bucket"),
  path: v.optional(v.string("path must be a single string"), ""),
  list: BooleanFlag("list"),
  create: BooleanFlag("create"),
});

export const UploadIdParamsSchema = v.object({
  uploadId: RequiredString("uploadId"),
});

export const PartNumberSchema = v.pipe(
  v.string("partNumber is required"),
  v.regex(/^\d+$/, "partNumber must be a positive integer"),
  v.transform(Number),
  v.safeInteger("partNumber is out of range"),
  v.minValue(1, "partNumber must be greater than or equal to 1"),
);

export const PartParamsSchema = v.object({
  uploadId: RequiredString("uploadId"),
  partNumber: PartNumberSchema,
});

const CompletedPartSchema = v.object({
  number: v.pipe(
    v.number("part number must be a number"),
    v.integer("part number must be an integer"),
    v.minValue(1, "part number must be greater than or equal to 1"),
  ),
  etag: v.string("part etag must be a string"),
});

// The discriminator is checked before the rest of the payload.
export const AbortOrCompleteBodySchema = v.variant(
  "action",
  [
    v.object({ action: v.literal("Abort") }),
    v.object({ action: v.literal("Complete"), parts: v.array(CompletedPartSchema) }),
  ],
  'action must be "Abort" or "Complete"',
);

export type AbortOrCompleteBody = v.InferOutput<typeof AbortOrCompleteBodySchema>;

// A key absent from an object is reported by the object schema itself, with
// the input left undefined.
function isMissingKey(issue: v.BaseIssue<unknown>): boolean {
  return issue.type === "object" && issue.input === undefined && issue.path !== undefined;
}

function describeIssues(issues: readonly v.BaseIssue<unknown>[]): string {
  return issues
    .map((issue) => {
      const path = v.getDotPath(issue);
      if (!path) return issue.message;
      if (isMissingKey(issue)) {
        const key = issue.path?.at(-1)?.key;
        return `${path}: ${String(key)} is required`;
      }
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Parses untrusted request input, turning schema failures into a 422.
 */
export function parseRequest<
  TSchema extends v.BaseSchema<unknown, unknown, v.BaseIssue<unknown>>,
>(schema: TSchema, input: unknown): v.InferOutput<TSchema> {
  const result = v.safeParse(schema, input);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.issues));
  }
  return result.output;
}
