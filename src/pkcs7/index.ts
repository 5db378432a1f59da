export * from "./signed-data.js";
