import type { ExtMetadataMode, StrategyKind } from "../config/types";

/**
 * Structured events emitted while documents are built.
 *
 * Events carry the facts a log line would otherwise bury in free text, so
 * callers (and tests) can react to them directly.
 */
export type FeedEvent =
	| {
			type: "strategy.selected";
			strategy: StrategyKind;
			mode: ExtMetadataMode;
	  }
	| {
			/**
			 * The requested mode is unknown or lacks its required field;
			 * metadata mode is used instead.
			 */
			type: "strategy.fallback";
			requestedMode: string;
			/** Config field the requested mode needs; absent for unknown modes. */
			missingField?: string;
	  }
	| {
			/** LOB body exceeded the configured limit and was not delivered. */
			type: "lob.content_skipped";
			docId: string;
			sizeBytes: number;
			maxContentBytes: number;
	  };

/** Receiver for {@link FeedEvent}s. */
export type EventSink = (event: FeedEvent) => void;
