export { type BackgroundProgressOptions, trackBackgroundTask } from "./background.js";
export { ASSUMED_BYTES_PER_SECOND, linearRamp, RAMP_CAP, rampStepForSize } from "./ramp.js";
