// src/core/framing/index.ts

export { buildFrame, frame, readFrameHeader, unframe } from './bitFramer';
