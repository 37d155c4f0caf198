/**
 * Producers barrel exports
 */

export { createProducer, createProducers } from "./createProducers";
export { GreenhouseProducer } from "./greenhouse/greenhouseProducer";
export { LeverProducer } from "./lever/leverProducer";
export { CareersPageProducer } from "./careersPage/careersPageProducer";
export { extractAnchors, resolveHref } from "./careersPage/htmlAnchors";
