export * from "./cursor.js";
export * from "./length.js";
