import { GATEWAY_TOOLS } from "@/backend/adapters/gateway/proxied-router";

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, { type: string; description: string; enum?: string[] }>;
    required: string[];
  };
}

const environmentProperty = {
  type: "string",
  enum: ["staging", "production"],
  description: "Target environment",
};

export const TOOL_CATALOGUE: readonly ToolDescriptor[] = [
  {
    name: GATEWAY_TOOLS.logs,
    description: "Read recent application logs",
    inputSchema: {
      type: "object",
      properties: {
        level: { type: "string", enum: ["DEBUG", "INFO", "WARN", "ERROR"], description: "Only entries of this level" },
        limit: { type: "integer", description: "Maximum number of entries (1-1000)" },
        since: { type: "string", description: "ISO-8601 lower bound on the entry timestamp" },
      },
      required: [],
    },
  },
  {
    name: GATEWAY_TOOLS.metrics,
    description: "Read the latest service metrics",
    inputSchema: {
      type: "object",
      properties: {
        limit: { type: "integer", description: "Maximum number of metrics (1-1000)" },
        service: { type: "string", description: "Only metrics reported by this service" },
      },
      required: [],
    },
  },
  {
    name: GATEWAY_TOOLS.deploy,
    description: "Deploy a service version to an environment",
    inputSchema: {
      type: "object",
      properties: {
        service_name: { type: "string", description: "Name of the service to deploy" },
        version: { type: "string", description: "Version to deploy" },
        environment: environmentProperty,
      },
      required: ["service_name", "version", "environment"],
    },
  },
  {
    name: GATEWAY_TOOLS.rollback,
    description: "Roll back a deployment",
    inputSchema: {
      type: "object",
      properties: {
        deployment_id: { type: "string", description: "Deployment to roll back" },
        reason: { type: "string", description: "Why the rollback is needed (at least 5 characters)" },
        environment: environmentProperty,
      },
      required: ["deployment_id", "reason", "environment"],
    },
  },
  {
    name: GATEWAY_TOOLS.authenticate,
    description: "Validate a session and describe the caller's roles and permissions",
    inputSchema: {
      type: "object",
      properties: {
        session_token: { type: "string", description: "Session token issued by the identity provider" },
        refresh_token: { type: "string", description: "Refresh token, used when the session has expired" },
      },
      required: ["session_token"],
    },
  },
];
