export * from "./equality";
