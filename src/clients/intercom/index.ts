export { IntercomClient } from "./intercomClient";
export type { IntercomClientConfig, IntercomConversation } from "@/types";
