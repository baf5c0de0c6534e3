export { ThrottleService, ThrottleServiceLive, type ThrottleServiceImpl } from "./service.js";
