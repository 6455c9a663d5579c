export * from "./core/Client";
export * from "./core/ClientError";
export * from "./core/SessionClient";
export * from "./core/UserPreferencesClient";
export * from "./types/Preferences";
export * from "./types/Session";
export * from "./util/LoggerCommon";
export * from "./util/ObjectUtils";
export * from "./util/Result";
