export * from "./result";
export * from "./presence";
export * from "./pagination";
export * from "./topic-service";
export * from "./skill-service";
