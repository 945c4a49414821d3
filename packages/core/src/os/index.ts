/**
 * OS Module - Operating System Detection
 */

export { OSDetector, DISTRIBUTION_MARKERS, fileExists } from './detector.js';
export { OperatingSystem, LinuxDistribution } from '../types/common.js';
