export {
	type ChatOutcome,
	Scheduler,
	SchedulerLive,
	type SchedulerServiceImpl,
	type SchedulerState,
	type SchedulerStatus,
	type TickReport,
	type TickTrigger,
} from "./service.js";
