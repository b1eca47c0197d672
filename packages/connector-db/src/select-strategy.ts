import { EXT_METADATA_MODES, type ExtMetadataMode, type FeedConfig } from "@rowfeed/core";
import { LobStrategy, MetadataStrategy, type Strategy, type StrategyDeps, UrlStrategy } from "./strategies";

/** Outcome of {@link selectStrategy}. */
export interface StrategySelection {
	readonly strategy: Strategy;
	/** Effective mode: the requested one, or `"none"` after a fallback. */
	readonly mode: ExtMetadataMode;
}

/** Field each external-metadata mode cannot run without. */
const REQUIRED_FIELDS = {
	"complete-url": "documentUrlField",
	"base-url": "documentIdField",
	lob: "lobField",
} as const satisfies Record<Exclude<ExtMetadataMode, "none">, keyof FeedConfig>;

function isExtMetadataMode(mode: string): mode is ExtMetadataMode {
	return EXT_METADATA_MODES.some((known) => known === mode);
}

/**
 * Choose the document strategy for a feed. This is the only place the
 * external-metadata mode is interpreted.
 *
 * | mode           | needs              | strategy               |
 * |----------------|--------------------|------------------------|
 * | `complete-url` | `documentUrlField` | Url (`complete-url`)   |
 * | `base-url`     | `documentIdField`  | Url (`base-url`)       |
 * | `lob`          | `lobField`         | Lob                    |
 * | anything else  |                    | Metadata, mode `none`  |
 *
 * An unknown mode, or a requested mode whose field is missing, falls back to metadata mode and
 * emits a `strategy.fallback` event instead of failing. The config is not
 * modified; the effective mode is returned.
 */
export function selectStrategy(deps: StrategyDeps): StrategySelection {
	const { config, events } = deps;
	const requested = config.extMetadataMode?.trim().toLowerCase() ?? "none";

	let selection: StrategySelection | undefined;
	if (!isExtMetadataMode(requested)) {
		if (requested !== "") events({ type: "strategy.fallback", requestedMode: requested });
	} else if (requested !== "none") {
		const field = REQUIRED_FIELDS[requested];
		if (config[field]) {
			selection = {
				strategy: requested === "lob" ? new LobStrategy(deps) : new UrlStrategy(deps, requested),
				mode: requested,
			};
		} else {
			events({ type: "strategy.fallback", requestedMode: requested, missingField: field });
		}
	}

	selection ??= { strategy: new MetadataStrategy(deps), mode: "none" };
	events({ type: "strategy.selected", strategy: selection.strategy.kind, mode: selection.mode });
	return selection;
}
