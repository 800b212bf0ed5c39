import "dotenv/config";
import { loadConfig } from "./config";
import { runMonitor } from "./monitor";

// one pass per invocation; scheduling is left to cron / CI
runMonitor(loadConfig()).catch((err) => {
  console.error("[monitor] run failed:", err);
  process.exit(1);
});
