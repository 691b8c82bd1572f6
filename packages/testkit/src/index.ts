export {
  createTempContextDir,
  removeDir,
  writeContextFile,
  muteLogs,
} from "./fs.js";
export { FakeMemoryService } from "./memory.js";
export { createClock } from "./timers.js";
export type { TestClock } from "./timers.js";
