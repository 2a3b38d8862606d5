import { createPlatform } from "../../src/core/platform.js";

export const linux = createPlatform("linux");
export const macos = createPlatform("macos");
export const windows = createPlatform("windows");
