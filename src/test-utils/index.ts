/**
 * Test utilities index
 *
 * Central export point for the devices and factories used across the test suite.
 */

export { MemoryDevice } from './memory-device.js'
export {
  createTestMux,
  createTempLogPath,
  readLog,
  FIXED_TIME,
  FIXED_STAMP_TIME,
  type TestMux
} from './test-factories.js'
