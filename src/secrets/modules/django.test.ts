import { describe, expect, test } from "vitest";
import { signDjangoCookie } from "../../test-utils/tokens";
import { djangoModule } from "./django";
import type { SecretEntry } from "./types";

const secrets: SecretEntry[] = [
  { value: "secret", origin: "default" },
  { value: "django-insecure-placeholder", origin: "default" },
];

describe("djangoModule", () => {
  test("finds the SECRET_KEY for a SHA256 signature", () => {
    const cookie = signDjangoCookie({ _auth_user_id: "1" }, "django-insecure-placeholder");
    const match = djangoModule.check([cookie], secrets);

    expect(match?.secret.value).toBe("django-insecure-placeholder");
    expect(match?.details).toEqual({ _auth_user_id: "1", signatureAlgorithm: "sha256" });
  });

  test("finds the SECRET_KEY for a legacy SHA1 signature", () => {
    const cookie = signDjangoCookie({ _auth_user_id: "2" }, "secret", "sha1");
    const match = djangoModule.check([cookie], secrets);

    expect(match?.secret.value).toBe("secret");
    expect(match?.details.signatureAlgorithm).toBe("sha1");
  });

  test("identifies but does not match an unknown key", () => {
    const cookie = signDjangoCookie({ a: 1 }, "unknown-key");
    expect(djangoModule.identify([cookie])).toBe(true);
    expect(djangoModule.check([cookie], secrets)).toBeNull();
  });

  test("rejects values with the wrong segment count", () => {
    expect(djangoModule.identify(["abc:def"])).toBe(false);
    expect(djangoModule.check(["abc:def:ghi:jkl"], secrets)).toBeNull();
  });
});
