export { ExpiryScheduler, type TickReport } from "./service"
