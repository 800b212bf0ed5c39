export { buildSubject, renderBody, emitNotification } from "./notifier";
