import { z } from 'zod';

/**
 * Build releases. `standard` is the production release; `dev` and `testing`
 * shorten network timings and make the genesis check advisory.
 */
export const BUILD_RELEASES = ['standard', 'dev', 'testing'] as const;
export type BuildRelease = (typeof BUILD_RELEASES)[number];
export const BuildReleaseEnum = z.enum(BUILD_RELEASES);

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export const LogLevelEnum = z.enum(LOG_LEVELS);
