export type { Handler, HandlerKind, HandlerRequest } from "./types.js";
export { createChitchatHandler } from "./chitchat.js";
export { createMenuQaHandler, createRecommendationHandler, formatOrderHistory } from "./menu-grounded.js";
export {
  HANDLER_FOR_INTENT,
  createDeploymentDispatcher,
  createDispatcher,
  needsMenu,
  rejectionFragments,
  rejectionMessage,
  type DeploymentResources,
  type Dispatcher,
} from "./dispatch.js";
