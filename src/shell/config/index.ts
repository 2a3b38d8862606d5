export { parseCLIArgs, USAGE } from "./cli.js";
export { CONFIG_FILE_NAME, loadSettings, parseConfigText } from "./loader.js";
