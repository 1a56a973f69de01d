export { parseCLIArgs } from "./cli.js";
