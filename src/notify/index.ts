export { buildRevisionAlert } from "./message";
export { createMailgunNotifier } from "./mailgun";
export { createLogNotifier } from "./log-notifier";
export type { Notifier, RevisionAlert, DeliveryResult } from "./types";
