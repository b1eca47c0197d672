export { combineEventSinks, loggingEventSink } from "./sink";
export type { EventSink, FeedEvent } from "./types";
