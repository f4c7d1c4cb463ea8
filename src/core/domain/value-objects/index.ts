export * from "./expected-rows.js";
export * from "./procedure-command.js";
