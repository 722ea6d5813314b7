import { describe, expect, it } from "vitest";
import { CookieJar } from "../src/markov/cookieJar";
import { extractVerificationToken } from "../src/markov/loginForm";

describe("extractVerificationToken", () => {
  it("reads the hidden input value regardless of attribute order", () => {
    const html = `
      <form method="post">
        <input name="Input.Email" type="email" value="" />
        <input type="hidden" value="tok-123" name="__RequestVerificationToken" />
      </form>`;
    expect(extractVerificationToken(html)).toBe("tok-123");
  });

  it("handles single quotes and decodes entities", () => {
    const html = `<INPUT name='__RequestVerificationToken' type='hidden' value='a&amp;b'>`;
    expect(extractVerificationToken(html)).toBe("a&b");
  });

  it("throws when the token is missing or empty", () => {
    expect(() => extractVerificationToken("<form></form>")).toThrow(
      "Could not find verification token in login form"
    );
    expect(() =>
      extractVerificationToken(`<input name="__RequestVerificationToken" value="">`)
    ).toThrow("Could not find verification token in login form");
    expect(() => extractVerificationToken(`<input name="__RequestVerificationToken">`)).toThrow(
      "Could not find verification token in login form"
    );
  });
});

describe("CookieJar", () => {
  it("keeps the latest value per cookie name and drops attributes", () => {
    const jar = new CookieJar();
    jar.store([".AspNetCore.Antiforgery=af1; path=/; samesite=strict; httponly", "session=s1; Path=/"]);
    jar.store(["session=s2; Path=/; HttpOnly", "garbage", "=novalue"]);
    jar.store(undefined);

    expect(jar.size).toBe(2);
    expect(jar.toHeader()).toBe(".AspNetCore.Antiforgery=af1; session=s2");
  });
});
