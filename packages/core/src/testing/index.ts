export {
  TestEventBuilder,
  dispatchAll,
  keyEvent,
  mouseDownEvent,
  mouseUpEvent,
  wheelEvent,
} from "./events.js";

export { FocusProbe } from "./widgets.js";
export type { FocusProbeOptions } from "./widgets.js";
