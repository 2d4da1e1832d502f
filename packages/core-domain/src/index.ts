export * from "./value-objects/ids";
export * from "./entities/file-record";
export * from "./entities/snapshot";
export * from "./entities/sync-action";
