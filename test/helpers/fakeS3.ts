import { createHash, randomUUID } from "node:crypto";
import Fastify, { type FastifyError, type FastifyReply } from "fastify";

// A minimal in-process S3 backend: just enough of the REST/XML dialect for
// ListObjectsV2, PutObject, UploadPart and the multipart lifecycle. It does
// not check signatures.

const NO_SUCH_UPLOAD =
  "The specified multipart upload does not exist. The upload ID may be invalid, or the upload may have been aborted or completed.";
const INVALID_PART =
  "One or more of the specified parts could not be found. The part may not have been uploaded, or the specified entity tag may not match the part's entity tag.";

export class FakeS3Error extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode: number = 400) {
    super(message);
    this.name = "FakeS3Error";
    this.code = code;
    this.statusCode = statusCode;
  }

  toXml(): string {
    return [
      `<?xml version="1.0" encoding="UTF-8"?>`,
      `<Error>`,
      `  <Code>${this.code}</Code>`,
      `  <Message>${escapeXml(this.message)}</Message>`,
      `  <RequestId>${randomUUID().replaceAll("-", "").slice(0, 16).toUpperCase()}</RequestId>`,
      `</Error>`,
    ].join("\n");
  }
}

function escapeXml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function unescapeXml(str: string): string {
  return str
    .replaceAll("&quot;", '"')
    .replaceAll("&apos;", "'")
    .replaceAll("&lt;", "<")
    .replaceAll("&gt;", ">")
    .replaceAll("&amp;", "&");
}

function md5Etag(body: Buffer): string {
  return `"${createHash("md5").update(body).digest("hex")}"`;
}

interface StoredObject {
  key: string;
  body: Buffer;
  etag: string;
}

interface StoredUpload {
  bucket: string;
  key: string;
  parts: Map<number, { body: Buffer; etag: string }>;
}

export class FakeS3Store {
  private buckets = new Map<string, Map<string, StoredObject>>();
  private uploads = new Map<string, StoredUpload>();
  /** Answer CreateMultipartUpload without an UploadId element. */
  omitUploadId = false;

  reset(): void {
    this.buckets.clear();
    this.uploads.clear();
    this.omitUploadId = false;
  }

  createBucket(name: string): void {
    if (!this.buckets.has(name)) {
      this.buckets.set(name, new Map());
    }
  }

  private bucket(name: string): Map<string, StoredObject> {
    const objects = this.buckets.get(name);
    if (!objects) {
      throw new FakeS3Error("NoSuchBucket", "The specified bucket does not exist", 404);
    }
    return objects;
  }

  putObject(bucket: string, key: string, body: Buffer | string): string {
    const data = typeof body === "string" ? Buffer.from(body) : body;
    const etag = md5Etag(data);
    this.bucket(bucket).set(key, { key, body: data, etag });
    return etag;
  }

  getObject(bucket: string, key: string): Buffer | undefined {
    return this.buckets.get(bucket)?.get(key)?.body;
  }

  listObjects(
    bucket: string,
    prefix: string,
    delimiter: string | undefined,
  ): { keys: string[]; commonPrefixes: string[] } {
    const keys: string[] = [];
    const commonPrefixes = new Set<string>();
    const sorted = Array.from(this.bucket(bucket).keys())
      .filter((key) => key.startsWith(prefix))
      .sort();

    for (const key of sorted) {
      if (delimiter) {
        const delimIdx = key.indexOf(delimiter, prefix.length);
        if (delimIdx >= 0) {
          commonPrefixes.add(key.slice(0, delimIdx + delimiter.length));
          continue;
        }
      }
      keys.push(key);
    }
    return { keys, commonPrefixes: Array.from(commonPrefixes) };
  }

  createMultipartUpload(bucket: string, key: string): string {
    this.bucket(bucket);
    const uploadId = randomUUID();
    this.uploads.set(uploadId, { bucket, key, parts: new Map() });
    return uploadId;
  }

  private upload(uploadId: string): StoredUpload {
    const upload = this.uploads.get(uploadId);
    if (!upload) {
      throw new FakeS3Error("NoSuchUpload", NO_SUCH_UPLOAD, 404);
    }
    return upload;
  }

  uploadPart(uploadId: string, partNumber: number, body: Buffer): string {
    const etag = md5Etag(body);
    this.upload(uploadId).parts.set(partNumber, { body, etag });
    return etag;
  }

  hasUpload(uploadId: string): boolean {
    return this.uploads.has(uploadId);
  }

  completeMultipartUpload(uploadId: string, parts: { partNumber: number; etag: string }[]): string {
    const upload = this.upload(uploadId);
    if (parts.length === 0) {
      throw new FakeS3Error(
        "MalformedXML",
        "The XML you provided was not well-formed or did not validate against our published schema",
      );
    }
    for (let i = 1; i < parts.length; i++) {
      if (parts[i].partNumber <= parts[i - 1].partNumber) {
        throw new FakeS3Error(
          "InvalidPartOrder",
          "The list of parts was not in ascending order. The parts list must be specified in order by part number.",
        );
      }
    }
    const bodies: Buffer[] = [];
    for (const spec of parts) {
      const part = upload.parts.get(spec.partNumber);
      if (!part || part.etag.replace(/"/g, "") !== spec.etag.replace(/"/g, "")) {
        throw new FakeS3Error("InvalidPart", INVALID_PART);
      }
      bodies.push(part.body);
    }

    const etag = this.putObject(upload.bucket, upload.key, Buffer.concat(bodies));
    this.uploads.delete(uploadId);
    return etag;
  }

  abortMultipartUpload(uploadId: string): void {
    this.upload(uploadId);
    this.uploads.delete(uploadId);
  }
}

export interface RecordedRequest {
  method: string;
  url: string;
}

export interface FakeS3Server {
  readonly store: FakeS3Store;
  readonly endpoint: string;
  readonly requests: RecordedRequest[];
  stop(): Promise<void>;
}

function queryOf(request: { query: unknown }): Record<string, string> {
  const query: Record<string, string> = {};
  if (typeof request.query === "object" && request.query !== null) {
    for (const [key, value] of Object.entries(request.query)) {
      if (typeof value === "string") query[key] = value;
    }
  }
  return query;
}

function keyOf(params: unknown): string {
  if (typeof params === "object" && params !== null) {
    const key: unknown = Reflect.get(params, "*");
    if (typeof key === "string") return key;
  }
  return "";
}

function bucketOf(params: unknown): string {
  if (typeof params === "object" && params !== null) {
    const bucket: unknown = Reflect.get(params, "bucket");
    if (typeof bucket === "string") return bucket;
  }
  return "";
}

function sendXml(reply: FastifyReply, xml: string): FastifyReply {
  reply.header("content-type", "application/xml");
  return reply.status(200).send(xml);
}

function listObjectsXml(bucket: string, query: Record<string, string>, store: FakeS3Store): string {
  const prefix = query["prefix"] ?? "";
  const delimiter = query["delimiter"];
  const { keys, commonPrefixes } = store.listObjects(bucket, prefix, delimiter);

  const parts = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<ListBucketResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/">`,
    `  <Name>${escapeXml(bucket)}</Name>`,
    `  <Prefix>${escapeXml(prefix)}</Prefix>`,
    `  <KeyCount>${keys.length + commonPrefixes.length}</KeyCount>`,
    `  <MaxKeys>1000</MaxKeys>`,
    `  <IsTruncated>false</IsTruncated>`,
  ];
  if (delimiter) {
    parts.push(`  <Delimiter>${escapeXml(delimiter)}</Delimiter>`);
  }
  for (const key of keys) {
    parts.push(
      `  <Contents><Key>${escapeXml(key)}</Key><Size>0</Size><StorageClass>STANDARD</StorageClass></Contents>`,
    );
  }
  for (const commonPrefix of commonPrefixes) {
    parts.push(`  <CommonPrefixes><Prefix>${escapeXml(commonPrefix)}</Prefix></CommonPrefixes>`);
  }
  parts.push(`</ListBucketResult>`);
  return parts.join("\n");
}

function parseCompletedParts(body: string): { partNumber: number; etag: string }[] {
  const parts: { partNumber: number; etag: string }[] = [];
  const partRegex =
    /<Part>\s*(?:<ETag>([\s\S]*?)<\/ETag>\s*<PartNumber>(\d+)<\/PartNumber>|<PartNumber>(\d+)<\/PartNumber>\s*<ETag>([\s\S]*?)<\/ETag>)\s*<\/Part>/g;
  for (const match of body.matchAll(partRegex)) {
    const etag = match[1] ?? match[4] ?? "";
    const partNumber = match[2] ?? match[3] ?? "0";
    parts.push({ partNumber: parseInt(partNumber, 10), etag: unescapeXml(etag) });
  }
  return parts;
}

export async function startFakeS3(): Promise<FakeS3Server> {
  const store = new FakeS3Store();
  const requests: RecordedRequest[] = [];
  const app = Fastify({ logger: false, forceCloseConnections: true });

  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "buffer" }, (_req, body, done) => {
    done(null, body);
  });

  app.addHook("onRequest", async (request) => {
    requests.push({ method: request.method, url: request.url });
  });

  app.setErrorHandler((err: FastifyError, _request, reply) => {
    if (err instanceof FakeS3Error) {
      reply.header("content-type", "application/xml");
      return reply.status(err.statusCode).send(err.toXml());
    }
    return reply.status(500).send(new FakeS3Error("InternalError", err.message, 500).toXml());
  });

  const bodyOf = (body: unknown): Buffer =>
    Buffer.isBuffer(body) ? body : Buffer.from(typeof body === "string" ? body : "");

  app.get("/:bucket", async (request, reply) =>
    sendXml(reply, listObjectsXml(bucketOf(request.params), queryOf(request), store)),
  );

  app.get("/:bucket/*", async (request, reply) => {
    const bucket = bucketOf(request.params);
    const key = keyOf(request.params);
    if (!key) {
      return sendXml(reply, listObjectsXml(bucket, queryOf(request), store));
    }
    const body = store.getObject(bucket, key);
    if (!body) {
      throw new FakeS3Error("NoSuchKey", "The specified key does not exist.", 404);
    }
    return reply.status(200).send(body);
  });

  app.put("/:bucket/*", async (request, reply) => {
    const bucket = bucketOf(request.params);
    const key = keyOf(request.params);
    const query = queryOf(request);
    const body = bodyOf(request.body);

    const etag =
      query["uploadId"] && query["partNumber"]
        ? store.uploadPart(query["uploadId"], parseInt(query["partNumber"], 10), body)
        : store.putObject(bucket, key, body);

    reply.header("etag", etag);
    return reply.status(200).send();
  });

  app.post("/:bucket/*", async (request, reply) => {
    const bucket = bucketOf(request.params);
    const key = keyOf(request.params);
    const query = queryOf(request);

    if ("uploads" in query) {
      const uploadId = store.createMultipartUpload(bucket, key);
      return sendXml(
        reply,
        [
          `<?xml version="1.0" encoding="UTF-8"?>`,
          `<InitiateMultipartUploadResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/">`,
          `  <Bucket>${escapeXml(bucket)}</Bucket>`,
          `  <Key>${escapeXml(key)}</Key>`,
          store.omitUploadId ? "" : `  <UploadId>${escapeXml(uploadId)}</UploadId>`,
          `</InitiateMultipartUploadResult>`,
        ].join("\n"),
      );
    }

    const uploadId = query["uploadId"];
    if (!uploadId) {
      throw new FakeS3Error("InvalidRequest", "Unsupported POST request");
    }
    const parts = parseCompletedParts(bodyOf(request.body).toString("utf-8"));
    const etag = store.completeMultipartUpload(uploadId, parts);
    return sendXml(
      reply,
      [
        `<?xml version="1.0" encoding="UTF-8"?>`,
        `<CompleteMultipartUploadResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/">`,
        `  <Bucket>${escapeXml(bucket)}</Bucket>`,
        `  <Key>${escapeXml(key)}</Key>`,
        `  <ETag>${escapeXml(etag)}</ETag>`,
        `</CompleteMultipartUploadResult>`,
      ].join("\n"),
    );
  });

  app.delete("/:bucket/*", async (request, reply) => {
    const uploadId = queryOf(request)["uploadId"];
    if (!uploadId) {
      throw new FakeS3Error("InvalidRequest", "Unsupported DELETE request");
    }
    store.abortMultipartUpload(uploadId);
    return reply.status(204).send();
  });

  const address = await app.listen({ port: 0, host: "127.0.0.1" });

  return {
    store,
    endpoint: address,
    requests,
    stop() {
      return app.close();
    },
  };
}
