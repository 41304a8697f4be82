/**
 * ルートインデックス
 */

export { createHealthRoutes } from "./health";
export { createRuleRoutes } from "./rules";
export { createAlertRoutes } from "./alerts";
export { createSilenceRoutes } from "./silences";
