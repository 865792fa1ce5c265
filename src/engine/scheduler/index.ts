export {
  CrawlScheduler,
  type CrawlReport,
  type CrawlTask,
  type SchedulerOptions,
  type TaskReport,
} from "./scheduler.js";
