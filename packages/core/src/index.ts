/**
 * packages/core/src/index.ts — Public API of the widget core.
 */

// Errors
export {
  LoomError,
  assertPosition,
  describeThrown,
  invalidPosition,
  throwCode,
  type LoomErrorCode,
  type LoomResult,
} from "./errors.js";

// Canvas
export { BLANK_CELL, Canvas, type Cell, type CursorMark } from "./canvas/canvas.js";
export { mergeStyles, rgb, type Rgb24, type TextStyle } from "./canvas/style.js";

// Sizing
export {
  boxSize,
  describeSize,
  fixedSize,
  flowSize,
  renderBox,
  sizeCols,
  sizeRows,
  type RenderBox,
  type RenderSize,
} from "./layout/types.js";
export {
  baseOf,
  countWeights,
  describeDimension,
  dim,
  isMax,
  type BaseDimension,
  type Dimension,
  type DimensionKind,
} from "./layout/dimension.js";
export {
  distributeWeighted,
  type WeightSlot,
  type WeightedDivision,
} from "./layout/engine/distributeWeighted.js";
export { horizontalSubSize, verticalSubSize, type VerticalContext } from "./layout/subSize.js";

// Input
export {
  MOD_ALT,
  MOD_CTRL,
  MOD_META,
  MOD_SHIFT,
  MOUSE_BUTTON_LEFT,
  MOUSE_BUTTON_MIDDLE,
  MOUSE_BUTTON_RIGHT,
  MOUSE_KIND_DOWN,
  MOUSE_KIND_DRAG,
  MOUSE_KIND_MOVE,
  MOUSE_KIND_UP,
  MOUSE_KIND_WHEEL,
  isButtonPress,
  isButtonRelease,
  isWheel,
  translateMouse,
  wheelDirection,
  type InputEvent,
  type KeyAction,
  type KeyEvent,
  type MouseEvent,
  type MouseKind,
  type WheelDirection,
} from "./events.js";
export * from "./keybindings/index.js";

// Focus and runtime
export {
  FOCUSED,
  NOT_FOCUSED,
  SELECTED_NOT_FOCUSED,
  findNextSelectable,
  nearestSelectable,
  selectIf,
  type FocusSelector,
  type SelectableLike,
} from "./runtime/focus.js";
export { ObserverList } from "./runtime/observers.js";
export {
  ClickTracker,
  anyButtonDown,
  type InputContext,
  type MouseState,
} from "./runtime/clickTargets.js";
export { setDevWarningSink, type DevWarningSink } from "./runtime/devWarnings.js";

// Widgets
export {
  applyPreferredPosition,
  inputIfSelectable,
  preferredPositionOf,
  type Child,
  type PreferredPosition,
  type Widget,
} from "./widgets/types.js";
export {
  FocusContainer,
  LinearContainer,
  toChild,
  type ChildInput,
  type ContainerOptions,
  type DimensionChange,
  type FocusChange,
  type Slot,
} from "./widgets/container.js";
export { Columns, type ColumnsLayout, type ColumnsOptions } from "./widgets/columns.js";
export { Pile, type PileLayout, type PileOptions } from "./widgets/pile.js";
export {
  Grid,
  gridCell,
  gridIndex,
  itemsPerRow,
  type GridCell,
  type GridLayout,
  type GridOptions,
} from "./widgets/grid.js";
export { Fill } from "./widgets/fill.js";
export { Text, type TextOptions, type TextWrap } from "./widgets/text.js";
export { Selectable } from "./widgets/selectable.js";
export { HPadding, type HAlign, type HPlacement } from "./widgets/hpadding.js";
