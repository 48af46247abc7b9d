import path from 'path';
import { z } from 'zod';
import { logger } from './logger';
import { Credentials, DownloadRequest } from '../types';

/**
 * InputValidator - Validates and sanitizes all user inputs
 * before they reach a command line
 */
export class InputValidator {
  /**
   * Validates and sanitizes text input
   * @param maxLength - Maximum allowed length (default: 4096)
   * @returns Sanitized text or null if empty
   */
  static sanitizeText(
    input: string | undefined,
    maxLength: number = 4096,
  ): string | null {
    if (!input) {
      return null;
    }

    const trimmed = input.trim();
    if (trimmed.length === 0) {
      return null;
    }

    if (trimmed.length > maxLength) {
      logger.warn('Input exceeds maximum length', {
        length: trimmed.length,
        maxLength,
      });
      return trimmed.substring(0, maxLength);
    }

    // Remove null bytes and other control characters (except newlines and tabs)
    return trimmed.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');
  }

  /**
   * Extracts the numeric content identifier from a store URL
   * (".../app/440/Some_Title/") or accepts a bare id ("440")
   * @returns The identifier, or null when none can be found
   */
  static extractContentId(input: string | undefined): string | null {
    const text = InputValidator.sanitizeText(input, 2048);
    if (!text) {
      return null;
    }

    if (/^\d+$/.test(text)) {
      return text;
    }

    const match = /\/app\/(\d+)/.exec(text);
    if (!match) {
      logger.debug('No content id in input', { input: text });
      return null;
    }
    return match[1];
  }

  /**
   * Output archive paths must be absolute and free of traversal segments
   */
  static isOutputPathSafe(outputPath: string): boolean {
    if (!outputPath || !path.isAbsolute(outputPath)) {
      return false;
    }
    if (outputPath.split(/[\\/]/).includes('..')) {
      logger.warn('Potential directory traversal attempt', { path: outputPath });
      return false;
    }
    return true;
  }
}

const nonEmpty = z.string().trim().min(1);

export const CredentialsSchema = z
  .object({
    anonymous: z.boolean().default(false),
    username: z.string().trim().optional(),
    password: z.string().optional(),
    guardCode: z.string().trim().optional(),
  })
  .refine((value) => value.anonymous || (!!value.username && !!value.password), {
    message: 'username and password are required unless anonymous is set',
  })
  .transform((value): Credentials =>
    value.anonymous || !value.username || !value.password
      ? { anonymous: true }
      : {
          anonymous: false,
          username: value.username,
          password: value.password,
          guardCode: value.guardCode ? value.guardCode : undefined,
        },
  );

export const DownloadRequestSchema = z
  .object({
    source: nonEmpty,
    outputPath: nonEmpty,
    resume: z.boolean().default(false),
    credentials: CredentialsSchema,
  })
  .transform(
    (value): DownloadRequest => ({
      source: value.source,
      outputPath: value.outputPath,
      resume: value.resume,
      credentials: value.credentials,
    }),
  );

export const OutputPathSchema = z.object({ outputPath: nonEmpty });
