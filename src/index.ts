/**
 * ctaphid-frames - CTAPHID init/continuation frame codec for USB-HID
 * security keys
 *
 * Main entry point exporting the public API.
 */

// Frame codec
export * from './protocol';

// Exceptions
export * from './exceptions';
