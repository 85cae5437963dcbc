export const SERVER_NAME = "youtrack-time-mcp";
export const SERVER_VERSION = "1.0.0";
