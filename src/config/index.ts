export { createTransportClient, loadTransportConfig } from "./config.js";
export type { TransportConfig } from "./config.js";
