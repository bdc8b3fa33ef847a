export { encodeLength, encodeFrame, encodeResponse, decodeResponse } from './frame.js';
export { StreamReader, type StreamReaderOptions, type ReadFrameOptions } from './stream-reader.js';
