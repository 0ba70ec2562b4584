export { communityConfigs } from "./community-configs.js";
export { attackSessions } from "./attack-sessions.js";
export { pendingVerifications } from "./pending-verifications.js";
export { verificationOutcomes } from "./verification-outcomes.js";
export { adminNotifications } from "./admin-notifications.js";
