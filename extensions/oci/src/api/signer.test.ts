import { describe, it, expect } from "vitest";
import { createHash, createPrivateKey, createVerify, generateKeyPairSync } from "node:crypto";
import { buildSigningString, signRequest } from "./signer.js";

const { privateKey, publicKey } = generateKeyPairSync("rsa", {
  modulusLength: 2048,
  privateKeyEncoding: { type: "pkcs8", format: "pem" },
  publicKeyEncoding: { type: "spki", format: "pem" },
});

const credentials = {
  keyId: "ocid1.tenancy.oc1..t/ocid1.user.oc1..u/aa:bb",
  privateKey: createPrivateKey(privateKey),
};

const NOW = new Date("2026-03-01T12:00:00.000Z");

function signatureOf(authorization: string | undefined): string {
  const match = /signature="([^"]+)"/.exec(authorization ?? "");
  return match?.[1] ?? "";
}

describe("signRequest", () => {
  it("signs date, request target and host for GET", () => {
    const url = "https://iaas.us-ashburn-1.oraclecloud.com/20160918/instances/ocid1.instance.x?limit=10";
    const headers = signRequest({ method: "GET", url }, credentials, NOW);

    expect(headers.date).toBe("Sun, 01 Mar 2026 12:00:00 GMT");
    expect(headers.host).toBe("iaas.us-ashburn-1.oraclecloud.com");
    expect(headers["content-length"]).toBeUndefined();
    expect(headers.authorization).toMatch(
      /^Signature version="1",keyId="ocid1\.tenancy\.oc1\.\.t\/ocid1\.user\.oc1\.\.u\/aa:bb",algorithm="rsa-sha256",headers="date \(request-target\) host",signature="/,
    );

    const signingString = buildSigningString(
      ["date", "(request-target)", "host"],
      headers,
      "GET",
      "/20160918/instances/ocid1.instance.x?limit=10",
    );
    const verified = createVerify("RSA-SHA256")
      .update(signingString)
      .verify(publicKey, signatureOf(headers.authorization), "base64");
    expect(verified).toBe(true);
  });

  it("adds and signs content headers for POST", () => {
    const body = JSON.stringify({ computeCount: 4 });
    const headers = signRequest(
      { method: "post", url: "https://database.us-ashburn-1.oraclecloud.com/20160918/x", body },
      credentials,
      NOW,
    );

    expect(headers["content-type"]).toBe("application/json");
    expect(headers["content-length"]).toBe(String(Buffer.byteLength(body)));
    expect(headers["x-content-sha256"]).toBe(createHash("sha256").update(body).digest("base64"));
    expect(headers.authorization).toContain(
      'headers="date (request-target) host content-length content-type x-content-sha256"',
    );
  });

  it("keeps caller headers, lower-cased", () => {
    const headers = signRequest(
      { method: "GET", url: "https://iaas.example.com/a", headers: { "Opc-Request-Id": "req-1" } },
      credentials,
      NOW,
    );
    expect(headers["opc-request-id"]).toBe("req-1");
  });
});

describe("buildSigningString", () => {
  it("lower-cases the method in the request target", () => {
    expect(buildSigningString(["(request-target)", "host"], { host: "h" }, "POST", "/p?q=1")).toBe(
      "(request-target): post /p?q=1\nhost: h",
    );
  });
});
