/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./listingAlerts";
export * from "./extractionRunner";
