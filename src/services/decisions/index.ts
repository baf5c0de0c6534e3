export {
	type DecisionError,
	DecisionService,
	type DecisionServiceImpl,
	DecisionServiceLive,
} from "./service.js";
