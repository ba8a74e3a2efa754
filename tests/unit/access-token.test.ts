import { describe, it, expect } from "vitest";
import { extractAccessToken, isAuthenticatedJar } from "../../src/services/session-manager";

describe("extractAccessToken", () => {
  it("returns the text from the prefix up to the next quote", () => {
    expect(extractAccessToken('...EAAGxyz123"rest', "EAAG")).toBe("EAAGxyz123");
  });

  it("uses the first occurrence of the prefix", () => {
    expect(extractAccessToken('{"a":"EAAGfirst","b":"EAAGsecond"}', "EAAG")).toBe("EAAGfirst");
  });

  it("returns null when the prefix is absent", () => {
    expect(extractAccessToken("<html>nothing here</html>", "EAAG")).toBeNull();
  });

  it("returns null when no quote closes the token", () => {
    expect(extractAccessToken("token=EAAGunterminated", "EAAG")).toBeNull();
  });

  it("honours a custom prefix", () => {
    expect(extractAccessToken('x="EAABabc"', "EAAB")).toBe("EAABabc");
  });
});

describe("isAuthenticatedJar", () => {
  const cookie = (name: string, value: string) => ({
    name,
    value,
    domain: ".facebook.com",
    path: "/",
    secure: true,
    httpOnly: false,
  });

  it("requires a non-empty c_user cookie", () => {
    expect(isAuthenticatedJar([cookie("datr", "abc"), cookie("c_user", "42")])).toBe(true);
    expect(isAuthenticatedJar([cookie("c_user", "")])).toBe(false);
    expect(isAuthenticatedJar([cookie("datr", "abc")])).toBe(false);
  });
});
