/**
 * mxhr-buffer - A FIFO buffer for streaming multipart/mixed (MXHR) responses
 *
 * Parts of mixed content types are pushed into the buffer and pulled out
 * framed for a single long-lived multipart response.
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Export encoding utilities
export * from './encoding/index.js';

// Export mimetype dispatch
export * from './mime/index.js';

// Public API
export * from './buffer/index.js';
