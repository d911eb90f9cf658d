/**
 * Utils barrel exports
 */

export * from "./sleep";
export * from "./parseNumber";
