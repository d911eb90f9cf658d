export { searchItems } from "./searchStream";
export type { SearchStreamOptions } from "./searchStream";
export { extractDefaultId, extractNextCursor, extractPageItems } from "./itemExtraction";
