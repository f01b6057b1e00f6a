export * from "./http/retry";
export * from "./http/transport";
export * from "./jira";
export { CONNECTORS, getConnector } from "./registry";
export type { Connector, NormalizeContext } from "./types";
