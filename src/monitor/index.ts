export { runMonitor } from "./runner";
