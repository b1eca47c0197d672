export { loadFeedConfigFromEnv } from "./env";
export { EXT_METADATA_MODES, type ExtMetadataMode, type FeedConfig, type StrategyKind } from "./types";
export { validateFeedConfig } from "./validate";
