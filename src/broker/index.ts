export { ResponseBroker, type PendingRequestHandle } from "./response-broker.js";
export { PendingRequest } from "./pending-request.js";
export { NotificationChannel, Subscription } from "./notification-channel.js";
export { Suspension, awaitWithTimeout, unwrapOutcome, type Outcome } from "./suspension.js";
