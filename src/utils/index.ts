/**
 * Utils barrel exports
 */

export * from "./text/textNormalization";
export * from "./text/htmlText";
export * from "./configValidation";
export * from "./dbErrors";
