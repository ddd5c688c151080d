export {
  getEnv,
  resetEnv,
  isDebugCaptureEnabled,
  shouldSaveScreenshots,
  shouldSaveScreenshotsOnError,
  type Env,
} from './env.js';
