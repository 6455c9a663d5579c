import { readCookie, SECONDS_PER_DAY, setCookie } from "./CookieUtil";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

function setTestCookie(cookie: string): void {
	// biome-ignore lint/suspicious/noDocumentCookie: Tests need to seed/clear jsdom cookies directly
	document.cookie = cookie;
}

function clearAllCookies(): void {
	for (const cookie of document.cookie.split(";")) {
		const name = cookie.split("=")[0]?.trim();
		if (!name) {
			continue;
		}
		setTestCookie(`${name}=; path=/; max-age=0`);
	}
}

describe("CookieUtil", () => {
	beforeEach(() => {
		clearAllCookies();
	});

	afterEach(() => {
		vi.restoreAllMocks();
		clearAllCookies();
	});

	describe("readCookie", () => {
		it("should return undefined when the cookie is absent", () => {
			setTestCookie("other=1; path=/");

			expect(readCookie("language")).toBeUndefined();
		});

		it("should find a cookie among several", () => {
			setTestCookie("language=cs; path=/");
			setTestCookie("dark_mode=true; path=/");

			expect(readCookie("language")).toBe("cs");
			expect(readCookie("dark_mode")).toBe("true");
		});

		it("should not match on a name prefix", () => {
			setTestCookie("language_old=en; path=/");

			expect(readCookie("language")).toBeUndefined();
		});

		it("should decode encoded values and keep values containing '='", () => {
			setTestCookie(`token=${encodeURIComponent("a=b c")}; path=/`);

			expect(readCookie("token")).toBe("a=b c");
		});

		it("should return the raw value when it cannot be decoded", () => {
			setTestCookie("broken=%E0%A4%A; path=/");

			expect(readCookie("broken")).toBe("%E0%A4%A");
		});

		it("should return undefined when the cookie jar throws", () => {
			vi.spyOn(document, "cookie", "get").mockImplementation(() => {
				throw new Error("SecurityError");
			});

			expect(readCookie("language")).toBeUndefined();
		});
	});

	describe("setCookie", () => {
		it("should write the attributes", () => {
			const setter = vi.spyOn(document, "cookie", "set");

			setCookie("dark_mode", "true", { maxAge: 365 * SECONDS_PER_DAY });

			expect(setter).toHaveBeenCalledWith("dark_mode=true; path=/; SameSite=Lax; max-age=31536000");
		});

		it("should add domain and Secure when asked", () => {
			const setter = vi.spyOn(document, "cookie", "set");

			setCookie("language", "en", { domain: "example.test", secure: true, sameSite: "Strict" });

			expect(setter).toHaveBeenCalledWith("language=en; path=/; SameSite=Strict; domain=example.test; Secure");
		});

		it("should round-trip an encoded value", () => {
			setCookie("note", "a;b", { encodeValue: true });

			expect(readCookie("note")).toBe("a;b");
		});

		it("should propagate cookie jar errors", () => {
			vi.spyOn(document, "cookie", "set").mockImplementation(() => {
				throw new Error("SecurityError");
			});

			expect(() => setCookie("language", "en")).toThrow("SecurityError");
		});
	});
});
