export * from "./logger";
export * from "./config";
export * from "./rateLimit";
export * from "./retry";
export * from "./bulk";
export * from "./clients/http";
export * from "./clients/intercom";
