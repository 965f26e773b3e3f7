export * from "./logger";
export * from "./listings";
export * from "./extractionRunner";
