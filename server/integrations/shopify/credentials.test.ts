import { describe, expect, it } from "vitest";
import { decrypt, encrypt } from "./credentials";

const KEY = "test-encryption-key";

describe("credentials", () => {
  it("decrypts what it encrypted", () => {
    const sealed = encrypt("tok_abc", KEY);
    expect(sealed).not.toContain("tok_abc");
    expect(sealed.split(":")).toHaveLength(4);
    expect(decrypt(sealed, KEY)).toBe("tok_abc");
  });

  it("uses a fresh salt and iv for every value", () => {
    expect(encrypt("tok_abc", KEY)).not.toBe(encrypt("tok_abc", KEY));
  });

  it("fails with the wrong key", () => {
    const sealed = encrypt("tok_abc", KEY);
    expect(() => decrypt(sealed, "another-encryption-key")).toThrow();
  });

  it("fails when the ciphertext was altered", () => {
    const [salt, iv, tag, data] = encrypt("tok_abc", KEY).split(":");
    const altered = `${salt}:${iv}:${tag}:${data.slice(0, -2)}${data.endsWith("00") ? "01" : "00"}`;
    expect(() => decrypt(altered, KEY)).toThrow();
  });

  it("rejects values in another format", () => {
    expect(() => decrypt("plain-token", KEY)).toThrow("Unrecognized credential format");
  });
});
