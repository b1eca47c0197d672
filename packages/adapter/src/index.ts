export { PostgresLobStore, type PostgresLobStoreConfig } from "./postgres-lob";
export { wrapQuery } from "./shared";
