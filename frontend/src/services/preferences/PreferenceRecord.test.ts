import { parsePreferenceRecord, pickPreferenceValues, serializePreferenceRecord } from "./PreferenceRecord";
import { describe, expect, it } from "vitest";

describe("PreferenceRecord", () => {
	describe("pickPreferenceValues", () => {
		it("should keep booleans and strings only", () => {
			expect(pickPreferenceValues({ language: "cs", darkMode: true, count: 3, nested: {}, empty: null })).toEqual({
				language: "cs",
				darkMode: true,
			});
		});
	});

	describe("parsePreferenceRecord", () => {
		it("should parse a stored record", () => {
			expect(parsePreferenceRecord('{"language":"cs","darkMode":true,"signature":"Regards"}')).toEqual({
				success: true,
				value: { language: "cs", darkMode: true, signature: "Regards" },
			});
		});

		it("should keep stored values as they are", () => {
			expect(parsePreferenceRecord('{"language":"de"}')).toEqual({ success: true, value: { language: "de" } });
		});

		it("should report invalid JSON", () => {
			const result = parsePreferenceRecord("{not json");
			expect(result.success).toBe(false);
			if (!result.success) {
				expect(result.error.kind).toBe("MalformedLocalRecord");
				expect(result.error.message).toBe("Preference record is not valid JSON");
				expect(result.error.cause).toBeInstanceOf(SyntaxError);
			}
		});

		it.each(["[1,2]", "null", '"en"', "42"])("should report %s as not an object", raw => {
			expect(parsePreferenceRecord(raw)).toEqual({
				success: false,
				error: { kind: "MalformedLocalRecord", message: "Preference record is not an object" },
			});
		});
	});

	describe("serializePreferenceRecord", () => {
		it("should write JSON that parses back to the same map", () => {
			const raw = serializePreferenceRecord({ language: "cs", darkMode: false });
			expect(raw).toBe('{"language":"cs","darkMode":false}');
			expect(parsePreferenceRecord(raw)).toEqual({ success: true, value: { language: "cs", darkMode: false } });
		});
	});
});
