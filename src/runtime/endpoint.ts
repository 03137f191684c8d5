import { readFileSync } from "node:fs";
import { z } from "zod";

export const RUNTIME_API_VERSION = "2018-06-01";

const PRODUCT_NAME = "function-runtime";
const UNKNOWN_VERSION = "UNKNOWN-VERSION";

const PackageJson = z.object({ version: z.string().min(1) });

/**
 * Reads this package's version from its package.json, which sits two levels
 * above both `src/runtime` and `dist/runtime`.
 */
export function readPackageVersion(
  packageJsonUrl: URL = new URL("../../package.json", import.meta.url),
): string {
  try {
    const parsed = PackageJson.safeParse(
      JSON.parse(readFileSync(packageJsonUrl, "utf-8")),
    );
    return parsed.success ? parsed.data.version : UNKNOWN_VERSION;
  } catch {
    return UNKNOWN_VERSION;
  }
}

export function buildUserAgent(
  platformVersion: string = process.version,
  adapterVersion: string = readPackageVersion(),
): string {
  return `${PRODUCT_NAME}/${platformVersion}-${adapterVersion}`;
}

export interface RuntimeEndpoint {
  readonly nextUrl: string;
  responseUrl(requestId: string): string;
  errorUrl(requestId: string): string;
}

export function createRuntimeEndpoint(runtimeApi: string): RuntimeEndpoint {
  const baseUrl = `http://${runtimeApi}/${RUNTIME_API_VERSION}/runtime/invocation`;

  return Object.freeze({
    nextUrl: `${baseUrl}/next`,
    responseUrl: (requestId: string) =>
      `${baseUrl}/${encodeURIComponent(requestId)}/response`,
    errorUrl: (requestId: string) =>
      `${baseUrl}/${encodeURIComponent(requestId)}/error`,
  });
}
