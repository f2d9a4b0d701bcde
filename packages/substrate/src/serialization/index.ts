export * from "./decode";
export * from "./schemas";
