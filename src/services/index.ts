/**
 * Services - key registration workflow and the capabilities it drives
 */

export * from './authorized-keys';
export * from './copy-id';
export * from './key-gen';
export * from './key-registrar';
export * from './key-store';
export * from './remote-exec';
