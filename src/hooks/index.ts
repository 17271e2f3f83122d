/**
 * Video Trimmer - React Hooks
 */

export { useVideoTrimmer, type UseVideoTrimmerReturn } from './useVideoTrimmer';
