export { WikipediaClient } from "./client";
export type { WikipediaClientOptions } from "./client";
export type { FetchLike } from "./types";
