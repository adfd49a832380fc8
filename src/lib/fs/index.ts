export * from "./filesystem";
