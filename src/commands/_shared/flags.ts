import { Flags } from '@oclif/core';

/**
 * Shared flag definitions for commands that bind the HTTP server.
 */
export const ServerFlags = {
  port: Flags.integer({
    char: 'p',
    description: 'Port to listen on',
    env: 'SLAB_USERS_PORT',
    default: 8080,
    min: 0,
    max: 65535,
  }),

  host: Flags.string({
    description: 'Address to bind',
    env: 'SLAB_USERS_HOST',
    default: '127.0.0.1',
  }),

  verbose: Flags.boolean({
    char: 'v',
    description: 'Log every request',
    default: false,
  }),
};
