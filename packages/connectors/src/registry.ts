import { jiraConnector } from "./jira";
import type { Connector } from "./types";

export const CONNECTORS: Connector[] = [jiraConnector];

export function getConnector(sourceType: string): Connector | undefined {
  return CONNECTORS.find((c) => c.sourceType === sourceType);
}
