/**
 * Pipeline barrel exports
 */

export { runCycle } from "./runCycle";
export { CyclePipeline } from "./cyclePipeline";
export { createPosting, readPostingInput } from "./posting";
export {
  createEmptyReport,
  countChannelErrors,
  countProducerErrors,
} from "./report";
