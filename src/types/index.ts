export * from "./logger";
export * from "./runtime";
export * from "./search";
export * from "./rateLimit";
export * from "./retry";
export * from "./bulk";
export * from "./config";
export * from "./clients/http";
export * from "./clients/intercom";
