export * from "./common/index.js";
export * from "./parser/index.js";
export * from "./pkcs7/index.js";
