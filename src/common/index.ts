export * from "./codecs.js";
export * from "./errors.js";
export * from "./types.js";
