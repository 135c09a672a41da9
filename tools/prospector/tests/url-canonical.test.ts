import { describe, expect, test } from "vitest";
import { canonicalizeUrl, dedupeUrls, isAbsoluteHttpUrl } from "../discover/url-canonical.js";

// base64("https://target.example")
const TARGET_B64 = "aHR0cHM6Ly90YXJnZXQuZXhhbXBsZQ==";

describe("canonicalizeUrl", () => {
  test("unwraps a base64 redirect parameter", () => {
    expect(canonicalizeUrl(`https://search.example/go?u=${TARGET_B64}`)).toBe("https://target.example");
  });

  test("tolerates the a1 marker and unpadded base64url", () => {
    expect(canonicalizeUrl(`https://search.example/ck/a?u=a1${TARGET_B64}&ntb=1`)).toBe("https://target.example");
    expect(canonicalizeUrl("https://search.example/go?u=aHR0cHM6Ly90YXJnZXQuZXhhbXBsZQ")).toBe(
      "https://target.example"
    );
  });

  test("unwraps percent-encoded uddg parameters", () => {
    expect(canonicalizeUrl("https://duckduckgo.com/l/?uddg=https%3A%2F%2Facme.example%2Fpricing&rut=abc")).toBe(
      "https://acme.example/pricing"
    );
  });

  test("leaves the URL unchanged when the wrapped value is not a URL", () => {
    const malformed = "https://search.example/go?u=@@@";
    const notUrl = "https://search.example/go?u=aGVsbG8="; // "hello"

    expect(canonicalizeUrl(malformed)).toBe(malformed);
    expect(canonicalizeUrl(notUrl)).toBe(notUrl);
    expect(canonicalizeUrl("not a url")).toBe("not a url");
  });

  test("is idempotent on canonical URLs", () => {
    const once = canonicalizeUrl(`https://search.example/go?u=${TARGET_B64}`);
    expect(canonicalizeUrl(once)).toBe(once);
    expect(canonicalizeUrl("https://acme.example/about?page=2")).toBe("https://acme.example/about?page=2");
  });
});

describe("dedupeUrls", () => {
  test("keeps the first occurrence of each canonical URL in order", () => {
    expect(
      dedupeUrls([
        `https://search.example/go?u=${TARGET_B64}`,
        "https://acme.example/",
        "https://target.example",
        "https://acme.example/",
      ])
    ).toEqual(["https://target.example", "https://acme.example/"]);
  });
});

describe("isAbsoluteHttpUrl", () => {
  test("accepts http(s) with a host only", () => {
    expect(isAbsoluteHttpUrl("https://acme.example")).toBe(true);
    expect(isAbsoluteHttpUrl("http://acme.example/a b")).toBe(false);
    expect(isAbsoluteHttpUrl("/relative/path")).toBe(false);
    expect(isAbsoluteHttpUrl("mailto:sales@acme.example")).toBe(false);
  });
});
