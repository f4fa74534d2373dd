/**
 * Tesseract OCR
 *
 * Runs the tesseract command-line tool on image bytes (stdin → stdout).
 * The binary and its language data are deployment dependencies: when
 * either is missing the failure is fatal for the whole process.
 */

import { spawn } from 'node:child_process';
import {
  logger,
  DocumentAcquisitionError,
  FatalConfigurationError,
  type AcquisitionOptions,
  type TextAcquirer,
} from '@invoicescan/shared';

export interface TesseractOptions {
  binaryPath: string;
  timeoutMs: number;
}

const MISSING_LANGUAGE_DATA = /Failed loading language|Error opening data file/i;

export function tesseractArgs(languages: ReadonlySet<string>): string[] {
  const args = ['stdin', 'stdout'];
  if (languages.size > 0) {
    args.push('-l', Array.from(languages).join('+'));
  }
  return args;
}

export class TesseractTextAcquirer implements TextAcquirer {
  readonly name = 'tesseract';

  constructor(private readonly options: TesseractOptions) {}

  acquire(bytes: Uint8Array, { label, languages }: AcquisitionOptions): Promise<string> {
    const args = tesseractArgs(languages);

    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.options.binaryPath, args, { timeout: this.options.timeoutMs });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          reject(
            new FatalConfigurationError(
              `tesseract binary not found at "${this.options.binaryPath}"`,
              'tesseract',
              { cause: error }
            )
          );
          return;
        }
        reject(new DocumentAcquisitionError(`tesseract could not run: ${error.message}`, { cause: error }));
      });

      child.on('close', (code, signal) => {
        const message = Buffer.concat(stderr).toString('utf-8').trim();

        if (code === 0) {
          resolve(Buffer.concat(stdout).toString('utf-8'));
          return;
        }
        if (MISSING_LANGUAGE_DATA.test(message)) {
          reject(
            new FatalConfigurationError(
              `tesseract language data missing for "${Array.from(languages).join('+')}"`,
              'tesseract-lang'
            )
          );
          return;
        }
        reject(
          new DocumentAcquisitionError(
            `tesseract exited with ${signal ?? `code ${code}`}: ${message || 'no output'}`
          )
        );
      });

      // The process may exit before reading all input (bad image, missing binary)
      child.stdin.on('error', (error) => {
        logger.debug('tesseract stdin closed early', { document_label: label, error: error.message });
      });
      child.stdin.end(Buffer.from(bytes));
    });
  }
}
