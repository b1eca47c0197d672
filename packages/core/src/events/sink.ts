import type { Logger, LogLevel } from "../logger";
import type { EventSink, FeedEvent } from "./types";

function describe(event: FeedEvent): { level: LogLevel; message: string } {
	switch (event.type) {
		case "strategy.selected":
			return {
				level: "info",
				message: `Running in ${event.mode} feed mode with the ${event.strategy} document strategy`,
			};
		case "strategy.fallback":
			return {
				level: "warn",
				message: event.missingField
					? `Mode "${event.requestedMode}" requires ${event.missingField}; falling back to metadata feed mode`
					: `Unknown mode "${event.requestedMode}"; falling back to metadata feed mode`,
			};
		case "lob.content_skipped":
			return {
				level: "warn",
				message: `Content of ${event.docId} is ${event.sizeBytes} bytes, over the ${event.maxContentBytes} byte limit; sending metadata only`,
			};
	}
}

/** Event sink that writes every event to `logger`, passing the event itself as `meta`. */
export function loggingEventSink(logger: Logger): EventSink {
	return (event) => {
		const { level, message } = describe(event);
		logger(level, message, { event: event.type, ...event });
	};
}

/** Fan an event out to several sinks. */
export function combineEventSinks(...sinks: EventSink[]): EventSink {
	return (event) => {
		for (const sink of sinks) {
			sink(event);
		}
	};
}
