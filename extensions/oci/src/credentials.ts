/**
 * OCI Credentials
 *
 * Reads an API-key profile from the OCI config file (INI) and loads the
 * private key used to sign REST requests.
 */

import { createPrivateKey, type KeyObject } from "node:crypto";
import { readFile } from "node:fs/promises";
import { parse as parseIni } from "ini";
import { expandHome } from "./config.js";
import { BackendUnavailableError, errorMessage } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

export type OciProfile = {
  name: string;
  user: string;
  fingerprint: string;
  tenancy: string;
  region?: string;
  keyFile: string;
  passPhrase?: string;
};

export type SigningCredentials = {
  keyId: string;
  privateKey: KeyObject;
};

const REQUIRED_KEYS = ["user", "fingerprint", "tenancy", "key_file"] as const;

// =============================================================================
// Profile Loading
// =============================================================================

/**
 * Parse a profile out of OCI config file contents. Missing profile or keys
 * mean the primary backend cannot authenticate, hence `BackendUnavailable`.
 */
export function parseOciProfile(content: string, profileName: string): OciProfile {
  const parsed: Record<string, unknown> = parseIni(content);
  const section = parsed[profileName];

  if (typeof section !== "object" || section === null) {
    throw new BackendUnavailableError(`Profile '${profileName}' not found in OCI config file`);
  }

  const values = new Map<string, string>();
  for (const [key, value] of Object.entries(section)) {
    if (typeof value === "string") values.set(key, value.trim());
  }

  const missing = REQUIRED_KEYS.filter((key) => !values.get(key));
  if (missing.length > 0) {
    throw new BackendUnavailableError(`Profile '${profileName}' is missing ${missing.join(", ")}`);
  }

  return {
    name: profileName,
    user: values.get("user") ?? "",
    fingerprint: values.get("fingerprint") ?? "",
    tenancy: values.get("tenancy") ?? "",
    region: values.get("region") || undefined,
    keyFile: expandHome(values.get("key_file") ?? ""),
    passPhrase: values.get("pass_phrase") || undefined,
  };
}

export async function loadOciProfile(configFile: string, profileName: string): Promise<OciProfile> {
  let content: string;
  try {
    content = await readFile(configFile, "utf-8");
  } catch (error) {
    throw new BackendUnavailableError(`Cannot read OCI config file ${configFile}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return parseOciProfile(content, profileName);
}

export async function loadSigningCredentials(profile: OciProfile): Promise<SigningCredentials> {
  let pem: string;
  try {
    pem = await readFile(profile.keyFile, "utf-8");
  } catch (error) {
    throw new BackendUnavailableError(`Cannot read API signing key ${profile.keyFile}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  try {
    const privateKey = createPrivateKey({ key: pem, format: "pem", passphrase: profile.passPhrase });
    return { keyId: `${profile.tenancy}/${profile.user}/${profile.fingerprint}`, privateKey };
  } catch (error) {
    throw new BackendUnavailableError(`Invalid API signing key ${profile.keyFile}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
