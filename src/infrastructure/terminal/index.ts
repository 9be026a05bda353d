export { ReadlinePrompt, createTerminalPrompt } from "./readlinePrompt";
