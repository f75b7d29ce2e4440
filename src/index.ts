export {
  TextArea,
  createTextArea,
  assertTabString,
  DEFAULT_TAB,
} from "./text-area.js";
export type { TextAreaOptions } from "./text-area.js";
export {
  inputFromInk,
  inputsFromInk,
  charKey,
  NULL_INPUT,
} from "./input.js";
export type { Input, Key, KeyFlags, NamedKey } from "./input.js";
export { projectSpans } from "./widget.js";
export type {
  Block,
  Span,
  Spans,
  TextAreaWidget,
  TextStyle,
} from "./widget.js";
export { Line, SENTINEL } from "./line.js";
export {
  TextAreaError,
  ConfigError,
  ContractViolationError,
  InvariantViolationError,
} from "./errors.js";
export { default as TextAreaView } from "./components/text-area-view.js";
export type { TextAreaViewProps } from "./components/text-area-view.js";
export { default as TextAreaEditor } from "./components/text-area-editor.js";
export type {
  TextAreaEditorHandle,
  TextAreaEditorProps,
} from "./components/text-area-editor.js";
export { loadConfig, toTextAreaOptions } from "./utils/config.js";
export type { AppConfig, StoredConfig } from "./utils/config.js";
