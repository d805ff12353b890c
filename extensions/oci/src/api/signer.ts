/**
 * OCI Extension — Request Signing
 *
 * HTTP Signature (draft-cavage, version 1, rsa-sha256) as required by the
 * OCI REST APIs. Body-carrying methods additionally sign the content headers.
 */

import { createHash, createSign } from "node:crypto";
import type { SigningCredentials } from "../credentials.js";

export type UnsignedRequest = {
  method: string;
  url: string;
  body?: string;
  headers?: Record<string, string>;
};

const BODY_METHODS = new Set(["POST", "PUT", "PATCH"]);
const BASE_HEADERS = ["date", "(request-target)", "host"];
const BODY_HEADERS = ["content-length", "content-type", "x-content-sha256"];

/**
 * Return the full header set for a signed request, including
 * `authorization`. Pure: the clock value is an argument.
 */
export function signRequest(
  request: UnsignedRequest,
  credentials: SigningCredentials,
  now: Date = new Date(),
): Record<string, string> {
  const url = new URL(request.url);
  const method = request.method.toUpperCase();

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(request.headers ?? {})) {
    headers[key.toLowerCase()] = value;
  }
  headers.date = now.toUTCString();
  headers.host = url.host;

  const signed = [...BASE_HEADERS];
  if (BODY_METHODS.has(method)) {
    const body = request.body ?? "";
    headers["content-type"] ??= "application/json";
    headers["content-length"] = String(Buffer.byteLength(body, "utf-8"));
    headers["x-content-sha256"] = createHash("sha256").update(body, "utf-8").digest("base64");
    signed.push(...BODY_HEADERS);
  }

  const signingString = buildSigningString(signed, headers, method, `${url.pathname}${url.search}`);
  const signature = createSign("RSA-SHA256").update(signingString).sign(credentials.privateKey, "base64");

  headers.authorization =
    `Signature version="1",keyId="${credentials.keyId}",algorithm="rsa-sha256",` +
    `headers="${signed.join(" ")}",signature="${signature}"`;

  return headers;
}

export function buildSigningString(
  signed: string[],
  headers: Record<string, string>,
  method: string,
  target: string,
): string {
  return signed
    .map((name) =>
      name === "(request-target)" ? `(request-target): ${method.toLowerCase()} ${target}` : `${name}: ${headers[name] ?? ""}`,
    )
    .join("\n");
}
