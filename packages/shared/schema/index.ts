export * from "./ratings";
export * from "./battles";
