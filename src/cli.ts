import { Command, Option } from "commander";
import {
  DEFAULT_API_PREFIX,
  DEFAULT_PORT,
  DEFAULT_PRESIGN_EXPIRES_IN,
  DEFAULT_REGION,
} from "./common/types.js";
import { packageInfo } from "./common/version.js";
import type { RawGatewayOptions } from "./config/gatewayConfig.js";

interface CliOptions {
  awsAccessKeyId: string;
  awsSecretAccessKey: string;
  awsRegion: string;
  awsHostname?: string;
  port: string;
  verbose: number;
  apiPrefix: string;
  presignExpiresIn: string;
  partUrlResponse: "json" | "redirect";
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function createCli(): Command {
  return new Command()
    .name("presign-gateway")
    .description("Presigned URL gateway for AWS and other S3 compatible storage systems")
    .version(packageInfo().version)
    .addOption(
      new Option("--aws-access-key-id <id>", "AWS access key id")
        .env("AWS_ACCESS_KEY_ID")
        .makeOptionMandatory(),
    )
    .addOption(
      new Option("--aws-secret-access-key <secret>", "AWS secret access key")
        .env("AWS_SECRET_ACCESS_KEY")
        .makeOptionMandatory(),
    )
    .addOption(
      new Option("--aws-region <region>", "AWS region, or the signing label of a custom endpoint")
        .env("AWS_REGION")
        .default(DEFAULT_REGION),
    )
    .addOption(
      new Option("-a, --aws-hostname <hostname>", "hostname of a non-AWS S3 endpoint").env(
        "AWS_HOSTNAME",
      ),
    )
    .addOption(
      new Option("-p, --port <port>", "port to listen on").env("PORT").default(String(DEFAULT_PORT)),
    )
    .addOption(
      new Option("--api-prefix <prefix>", "path prefix of the API routes")
        .env("API_PREFIX")
        .default(DEFAULT_API_PREFIX),
    )
    .addOption(
      new Option("--presign-expires-in <seconds>", "validity of presigned URLs")
        .env("PRESIGN_EXPIRES_IN")
        .default(String(DEFAULT_PRESIGN_EXPIRES_IN)),
    )
    .addOption(
      new Option("--part-url-response <mode>", "how part upload URLs are handed out")
        .env("PART_URL_RESPONSE")
        .choices(["json", "redirect"])
        .default("json"),
    )
    .option("-v, --verbose", "increase log verbosity (repeatable)", increaseVerbosity, 0);
}

/**
 * Parses `argv` (including the node and script entries) with environment
 * fallbacks. Throws a `CommanderError` instead of exiting.
 */
export function parseCliOptions(argv: string[]): RawGatewayOptions {
  const program = createCli().exitOverride();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  return {
    awsAccessKeyId: options.awsAccessKeyId,
    awsSecretAccessKey: options.awsSecretAccessKey,
    awsRegion: options.awsRegion,
    awsHostname: options.awsHostname,
    port: options.port,
    verbose: options.verbose,
    apiPrefix: options.apiPrefix,
    presignExpiresIn: options.presignExpiresIn,
    partUrlResponse: options.partUrlResponse,
  };
}
