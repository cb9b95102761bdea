import { describe, expect, it } from "vitest";
import { fingerprint, isHttpUrl, normalizeUrl, sha256 } from "./utils.js";

describe("sha256 / fingerprint", () => {
  it("produces the standard hex digest", () => {
    expect(sha256("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("is stable and content-sensitive", () => {
    expect(fingerprint("line one\nline two")).toBe(fingerprint("line one\nline two"));
    expect(fingerprint("line one\nline two")).not.toBe(fingerprint("line one\nline 2"));
    expect(fingerprint("x")).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("normalizeUrl", () => {
  it("resolves relative links and drops the fragment", () => {
    expect(normalizeUrl("../notice/7.htm#main", "https://example.edu/a/b/list.htm")).toBe(
      "https://example.edu/a/notice/7.htm"
    );
  });

  it("removes volatile query parameters only", () => {
    expect(normalizeUrl("https://example.edu/view?id=42&t=1700000000&utm_source=mail&SID=xyz")).toBe(
      "https://example.edu/view?id=42"
    );
  });

  it("strips servlet session path parameters", () => {
    expect(normalizeUrl("https://example.edu/info/list.jsp;jsessionid=ABC123?page=2")).toBe(
      "https://example.edu/info/list.jsp?page=2"
    );
  });

  it("returns unparseable input unchanged", () => {
    expect(normalizeUrl("relative/only")).toBe("relative/only");
  });
});

describe("isHttpUrl", () => {
  it.each([
    ["https://example.edu/", true],
    ["http://example.edu/x", true],
    ["ftp://example.edu/", false],
    ["example.edu", false],
    ["mailto:a@example.edu", false],
  ])("%s -> %s", (value, expected) => {
    expect(isHttpUrl(value)).toBe(expected);
  });
});
