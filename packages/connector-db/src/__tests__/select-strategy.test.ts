import type { FeedEvent } from "@rowfeed/core";
import { describe, expect, it, vi } from "vitest";
import { selectStrategy } from "../select-strategy";
import { htmlRowSerializer } from "../serializer";
import { baseConfig, makeBuilder } from "./test-helpers";

function select(overrides: Parameters<typeof baseConfig>[0]) {
	const events = vi.fn<(event: FeedEvent) => void>();
	const config = baseConfig(overrides);
	const selection = selectStrategy({ config, serializer: htmlRowSerializer, events });
	return { selection, events, config };
}

describe("selectStrategy", () => {
	it("selects the complete-URL strategy when the URL column is configured", () => {
		const { selection, events } = select({
			extMetadataMode: "complete-url",
			documentUrlField: "url",
		});
		expect(selection.mode).toBe("complete-url");
		expect(selection.strategy.kind).toBe("url");
		if (selection.strategy.kind === "url") {
			expect(selection.strategy.urlType).toBe("complete-url");
		}
		expect(events).toHaveBeenCalledTimes(1);
		expect(events).toHaveBeenCalledWith({
			type: "strategy.selected",
			strategy: "url",
			mode: "complete-url",
		});
	});

	it("selects the base-URL strategy when the document ID column is configured", () => {
		const { selection } = select({ extMetadataMode: "base-url", documentIdField: "id" });
		expect(selection.mode).toBe("base-url");
		if (selection.strategy.kind !== "url") throw new Error("expected url strategy");
		expect(selection.strategy.urlType).toBe("base-url");
	});

	it("selects the LOB strategy when the LOB column is configured", () => {
		const { selection } = select({ extMetadataMode: "lob", lobField: "body" });
		expect(selection.mode).toBe("lob");
		expect(selection.strategy.kind).toBe("lob");
	});

	it("selects the metadata strategy without emitting a fallback for mode none", () => {
		for (const extMetadataMode of [undefined, "none", "NONE", ""]) {
			const { selection, events } = select({ extMetadataMode });
			expect(selection.mode).toBe("none");
			expect(selection.strategy.kind).toBe("metadata");
			expect(events).not.toHaveBeenCalledWith(
				expect.objectContaining({ type: "strategy.fallback" }),
			);
		}
	});

	it.each([
		["complete-url", "documentUrlField"],
		["base-url", "documentIdField"],
		["lob", "lobField"],
	])("falls back to metadata when %s lacks %s", (mode, field) => {
		const { selection, events } = select({ extMetadataMode: mode });
		expect(selection.mode).toBe("none");
		expect(selection.strategy.kind).toBe("metadata");
		expect(events.mock.calls).toEqual([
			[{ type: "strategy.fallback", requestedMode: mode, missingField: field }],
			[{ type: "strategy.selected", strategy: "metadata", mode: "none" }],
		]);
	});

	it("falls back to metadata for an unknown mode", () => {
		const { selection, events } = select({ extMetadataMode: "sitemap" });
		expect(selection.mode).toBe("none");
		expect(events).toHaveBeenCalledWith({ type: "strategy.fallback", requestedMode: "sitemap" });
	});

	it("matches mode names case-insensitively", () => {
		const { selection } = select({ extMetadataMode: " LOB ", lobField: "body" });
		expect(selection.mode).toBe("lob");
	});

	it("ignores fields belonging to other modes", () => {
		const { selection } = select({
			extMetadataMode: "lob",
			documentUrlField: "url",
			documentIdField: "id",
		});
		expect(selection.strategy.kind).toBe("metadata");
	});

	it("does not modify the configuration", () => {
		const { config } = select({ extMetadataMode: "lob" });
		expect(config.extMetadataMode).toBe("lob");
	});
});

describe("createDocumentBuilder fallback logging", () => {
	it("logs the fallback as a warning carrying the structured event", () => {
		const { builder, logger, events } = makeBuilder({ extMetadataMode: "lob" });
		expect(builder.mode).toBe("none");
		expect(builder.config.extMetadataMode).toBe("lob");

		const fallback = { type: "strategy.fallback", requestedMode: "lob", missingField: "lobField" };
		expect(events).toHaveBeenCalledWith(fallback);
		expect(logger).toHaveBeenCalledWith(
			"warn",
			'Mode "lob" requires lobField; falling back to metadata feed mode',
			{ event: "strategy.fallback", ...fallback },
		);
		expect(logger).toHaveBeenLastCalledWith(
			"info",
			"Running in none feed mode with the metadata document strategy",
			{ event: "strategy.selected", type: "strategy.selected", strategy: "metadata", mode: "none" },
		);
	});

	it("keeps each builder's fallback local", () => {
		const fallback = makeBuilder({ extMetadataMode: "lob" });
		const lob = makeBuilder({ extMetadataMode: "lob", lobField: "body" });
		expect(fallback.builder.mode).toBe("none");
		expect(lob.builder.mode).toBe("lob");
	});
});
