export {
  QueryConsole,
  MENU_COMMANDS,
  type MenuCommand,
  type QueryConsoleOptions,
  type ExitReason,
} from "./queryConsole";
export {
  MENU_TEXT,
  MENU_PROMPT,
  FILE_PROMPT,
  KIND_PROMPT,
  formatSummary,
  formatFileList,
  formatFileDetails,
  formatKindList,
  formatKindSearch,
} from "./format";
export { parseSelection } from "./selection";
