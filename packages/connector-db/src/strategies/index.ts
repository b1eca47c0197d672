export { LobStrategy } from "./lob";
export { METADATA_MIME_TYPE, MetadataStrategy } from "./metadata";
export { DISPLAY_URL_SCHEME, displayUrlFor, type StrategyDeps } from "./shared";
export { type UrlType, UrlStrategy } from "./url";

import type { LobStrategy } from "./lob";
import type { MetadataStrategy } from "./metadata";
import type { UrlStrategy } from "./url";

/** The strategy a builder runs, discriminated by `kind`. */
export type Strategy = MetadataStrategy | UrlStrategy | LobStrategy;
