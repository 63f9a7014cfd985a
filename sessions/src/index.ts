export * from "./config.js";
export * from "./session1.js";
export * from "./session2.js";
export * from "./session3.js";
