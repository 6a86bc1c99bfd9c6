// CHANGE: Public entry of SHELL configuration
// PURITY: SHELL

export { parseCLIArgs } from "./cli.js";
