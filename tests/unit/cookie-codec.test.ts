import { describe, it, expect } from "vitest";
import { parseCookies, sameCookieSet, serializeCookies, toCookieHeader } from "../../src/services/cookie-codec";
import { ParseError } from "../../src/core/errors";

describe("cookie codec", () => {
  it("treats a missing blob as no cookies", () => {
    expect(parseCookies(null)).toEqual([]);
    expect(parseCookies("")).toEqual([]);
  });

  it("fills in domain, path and flags", () => {
    expect(parseCookies('[{"name":"c_user","value":"42"}]')).toEqual([
      { name: "c_user", value: "42", domain: ".facebook.com", path: "/", secure: true, httpOnly: false },
    ]);
  });

  it("keeps expiry and sameSite through serialize and parse", () => {
    const cookies = [
      { name: "xs", value: "abc", domain: ".facebook.com", path: "/", secure: true, httpOnly: true, expires: 1700000000, sameSite: "None" as const },
    ];
    expect(parseCookies(serializeCookies(cookies))).toEqual(cookies);
  });

  it("rejects invalid JSON and malformed entries", () => {
    expect(() => parseCookies("{not json")).toThrow(ParseError);
    expect(() => parseCookies('[{"value":"42"}]')).toThrow(ParseError);
    expect(() => parseCookies('{"name":"c_user"}')).toThrow(ParseError);
  });

  it("renders a Cookie header", () => {
    const cookies = parseCookies('[{"name":"c_user","value":"42"},{"name":"xs","value":"abc"}]');
    expect(toCookieHeader(cookies)).toBe("c_user=42; xs=abc");
  });

  it("compares cookie sets regardless of order", () => {
    const a = parseCookies('[{"name":"c_user","value":"42"},{"name":"xs","value":"abc"}]');
    const b = parseCookies('[{"name":"xs","value":"abc"},{"name":"c_user","value":"42"}]');
    const c = parseCookies('[{"name":"xs","value":"def"},{"name":"c_user","value":"42"}]');
    expect(sameCookieSet(a, b)).toBe(true);
    expect(sameCookieSet(a, c)).toBe(false);
    expect(sameCookieSet(a, a.slice(1))).toBe(false);
  });
});
