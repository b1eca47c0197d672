import { describe, expect, it } from "vitest";
import { buildHandle, buildSnapshot } from "../document-builder";
import { makeBuilder, STANDARD_ROW_HTML, sha1, standardRow } from "./test-helpers";

describe("MetadataStrategy", () => {
	it("builds the standard row's snapshot", async () => {
		const { builder } = makeBuilder();
		expect(builder.strategy.kind).toBe("metadata");

		const result = await buildSnapshot(builder, standardRow());
		expect(result.ok).toBe(true);
		if (!result.ok) return;

		const { snapshot } = result.value;
		expect(snapshot.docId).toBe("MSxsYXN0XzAx");
		expect(snapshot.checksum).toBe(sha1(STANDARD_ROW_HTML));
		expect(snapshot.json).toBe(
			`{"google:docid":"MSxsYXN0XzAx","google:sum":"${sha1(STANDARD_ROW_HTML)}"}`,
		);
	});

	it("builds the standard row's document", async () => {
		const { builder } = makeBuilder();
		const built = await buildSnapshot(builder, standardRow());
		expect(built.ok).toBe(true);
		if (!built.ok) return;

		const handle = await buildHandle(built.value.holder);
		expect(handle.ok).toBe(true);
		if (!handle.ok) return;

		const { document } = handle.value;
		expect(handle.value.docId).toBe("MSxsYXN0XzAx");
		expect(document.mimeType).toBe("text/html");
		expect(document.displayUrl).toBe("dbconnector://testconnector.localhost/MSxsYXN0XzAx");
		expect(document.properties).toEqual({ id: "1", lastName: "last_01" });
		expect(document.searchUrl).toBeUndefined();
		expect(document.content).toEqual({ kind: "text", text: STANDARD_ROW_HTML });

		const body = document.content?.kind === "text" ? document.content.text : "";
		expect(body).toContain("id=1");
		expect(body).toContain("lastName=last_01");
	});

	it("never exposes the checksum as a document property", async () => {
		const { builder } = makeBuilder();
		const built = await buildSnapshot(builder, standardRow());
		if (!built.ok) throw built.error;
		const handle = await buildHandle(built.value.holder);
		if (!handle.ok) throw handle.error;

		const { properties } = handle.value.document;
		expect(Object.keys(properties)).not.toContain("google:sum");
		expect(Object.values(properties)).not.toContain(built.value.snapshot.checksum);
		expect(Object.keys(handle.value.document)).not.toContain("checksum");
	});

	it("ignores skip-listed columns for the checksum and the properties", async () => {
		const { builder } = makeBuilder({ skipColumns: ["AUDIT_NOTE"] });

		const first = await buildSnapshot(builder, { ...standardRow(), audit_note: "first" });
		const second = await buildSnapshot(builder, { ...standardRow(), audit_note: "second" });
		if (!first.ok || !second.ok) throw new Error("snapshot failed");

		expect(first.value.snapshot.json).toBe(second.value.snapshot.json);
		expect(first.value.snapshot.checksum).toBe(sha1(STANDARD_ROW_HTML));

		const handle = await buildHandle(second.value.holder);
		if (!handle.ok) throw handle.error;
		expect(handle.value.document.properties).toEqual({ id: "1", lastName: "last_01" });
	});

	it("changes the checksum when a metadata column changes", async () => {
		const { builder } = makeBuilder();
		const first = await buildSnapshot(builder, { ...standardRow(), city: "Oslo" });
		const second = await buildSnapshot(builder, { ...standardRow(), city: "Bergen" });
		if (!first.ok || !second.ok) throw new Error("snapshot failed");

		expect(first.value.snapshot.docId).toBe(second.value.snapshot.docId);
		expect(first.value.snapshot.checksum).not.toBe(second.value.snapshot.checksum);
	});

	it("reports the last-modified timestamp without checksumming it", async () => {
		const { builder } = makeBuilder({ lastModifiedField: "updated_at" });
		const earlier = new Date("2024-01-01T00:00:00Z");
		const later = new Date("2024-02-01T00:00:00Z");

		const first = await buildSnapshot(builder, { ...standardRow(), updated_at: earlier });
		const second = await buildSnapshot(builder, { ...standardRow(), updated_at: later });
		if (!first.ok || !second.ok) throw new Error("snapshot failed");
		expect(first.value.snapshot.checksum).toBe(second.value.snapshot.checksum);

		const handle = await buildHandle(second.value.holder);
		if (!handle.ok) throw handle.error;
		expect(handle.value.document.lastModified).toEqual(later);
		expect(handle.value.document.properties).not.toHaveProperty("updated_at");
	});

	it("hands out a copy of the last-modified timestamp", async () => {
		const { builder } = makeBuilder({ lastModifiedField: "updated_at" });
		const built = await buildSnapshot(builder, {
			...standardRow(),
			updated_at: new Date("2024-02-01T00:00:00Z"),
		});
		if (!built.ok) throw built.error;
		const { holder } = built.value;

		const first = await buildHandle(holder);
		if (!first.ok) throw first.error;
		first.value.document.lastModified?.setUTCFullYear(1999);

		expect(holder.row.updated_at).toEqual(new Date("2024-02-01T00:00:00Z"));
		const second = await buildHandle(holder);
		if (!second.ok) throw second.error;
		expect(second.value.document.lastModified).toEqual(new Date("2024-02-01T00:00:00Z"));
	});

	it("leaves lastModified unset when the column is not a timestamp", async () => {
		const { builder } = makeBuilder({ lastModifiedField: "updated_at" });
		const built = await buildSnapshot(builder, { ...standardRow(), updated_at: "yesterday" });
		if (!built.ok) throw built.error;
		const handle = await buildHandle(built.value.holder);
		if (!handle.ok) throw handle.error;
		expect(handle.value.document.lastModified).toBeUndefined();
	});

	it("omits null columns from the properties but not from the checksum", async () => {
		const { builder } = makeBuilder();
		const withNull = await buildSnapshot(builder, { ...standardRow(), city: null });
		const without = await buildSnapshot(builder, standardRow());
		if (!withNull.ok || !without.ok) throw new Error("snapshot failed");
		expect(withNull.value.snapshot.checksum).not.toBe(without.value.snapshot.checksum);

		const handle = await buildHandle(withNull.value.holder);
		if (!handle.ok) throw handle.error;
		expect(handle.value.document.properties).toEqual({ id: "1", lastName: "last_01" });
	});

	it("never reads byte columns", async () => {
		const { builder } = makeBuilder();
		const first = await buildSnapshot(builder, { ...standardRow(), body: Buffer.from("v1") });
		const second = await buildSnapshot(builder, { ...standardRow(), body: Buffer.from("v2") });
		if (!first.ok || !second.ok) throw new Error("snapshot failed");
		expect(first.value.snapshot.checksum).toBe(second.value.snapshot.checksum);
	});
});
