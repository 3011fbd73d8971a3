/**
 * @guild-ledger/node — Runtime composition for the guild ledger.
 */

export { loadConfig, retryConfigFrom, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { PeriodicTask } from "./scheduler.js";
export type { PeriodicTaskOptions } from "./scheduler.js";
export {
  ActionRouter,
  ActionError,
  resolveAction,
  panelActionId,
  planActionId,
} from "./actions.js";
export type {
  Action,
  ActionErrorCode,
  ActionContext,
  ActionOutcome,
  ActionRouterDeps,
  PlanButton,
} from "./actions.js";
export { createOfflineGateway } from "./platform.js";
export type { PlatformGateway } from "./platform.js";
export { createRuntime } from "./runtime.js";
export type { Runtime, RuntimeOptions } from "./runtime.js";
