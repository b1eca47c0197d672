import { describe, expect, it } from "vitest";
import { ConfigValidationError } from "../../result/errors";
import { validateFeedConfig } from "../validate";

function validConfig(): Record<string, unknown> {
	return {
		connectorName: "orders",
		primaryKeys: ["id"],
	};
}

describe("validateFeedConfig", () => {
	it("accepts a minimal config and defaults skipColumns", () => {
		const result = validateFeedConfig(validConfig());
		expect(result).toEqual({
			ok: true,
			value: { connectorName: "orders", primaryKeys: ["id"], skipColumns: [] },
		});
	});

	it("accepts a full LOB config", () => {
		const result = validateFeedConfig({
			...validConfig(),
			extMetadataMode: "lob",
			skipColumns: ["secret"],
			lastModifiedField: "updated_at",
			lobField: "body",
			fetchUrlField: "link",
			lobMimeType: "application/pdf",
			maxContentBytes: 1024,
		});
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.lobField).toBe("body");
			expect(result.value.maxContentBytes).toBe(1024);
			expect(result.value.skipColumns).toEqual(["secret"]);
		}
	});

	it("drops keys it does not know", () => {
		const result = validateFeedConfig({ ...validConfig(), password: "test-secret" });
		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value).not.toHaveProperty("password");
	});

	it.each([
		[null, "Feed config must be an object"],
		["orders", "Feed config must be an object"],
		[[], "Feed config must be an object"],
		[{ primaryKeys: ["id"] }, "connectorName must be a non-empty string"],
		[{ connectorName: "", primaryKeys: ["id"] }, "connectorName must be a non-empty string"],
		[{ connectorName: "orders" }, "primaryKeys must be a non-empty array"],
		[{ connectorName: "orders", primaryKeys: [] }, "primaryKeys must be a non-empty array"],
		[{ connectorName: "orders", primaryKeys: ["id", ""] }, "primaryKeys[1] must be a non-empty string"],
		[{ ...validConfig(), skipColumns: "a,b" }, "skipColumns must be an array"],
		[{ ...validConfig(), skipColumns: ["a", 2] }, "skipColumns entries must be strings"],
		[{ ...validConfig(), lobField: "" }, "lobField must be a non-empty string when provided"],
		[{ ...validConfig(), baseUrl: 42 }, "baseUrl must be a non-empty string when provided"],
		[{ ...validConfig(), maxContentBytes: 0 }, "maxContentBytes must be a positive integer"],
		[{ ...validConfig(), maxContentBytes: 1.5 }, "maxContentBytes must be a positive integer"],
		[{ ...validConfig(), maxContentBytes: "10" }, "maxContentBytes must be a positive integer"],
	])("rejects %j", (input, message) => {
		const result = validateFeedConfig(input);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ConfigValidationError);
			expect(result.error.code).toBe("CONFIG_INVALID");
			expect(result.error.message).toBe(message);
		}
	});

	it("leaves mode/field consistency to strategy selection", () => {
		const result = validateFeedConfig({ ...validConfig(), extMetadataMode: "lob" });
		expect(result.ok).toBe(true);
	});
});
