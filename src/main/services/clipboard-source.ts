/**
 * Clipboard source: the only place that touches the OS clipboard.
 *
 * `ClipboardSource` is a capability with no state of its own; failures reject
 * with a recoverable ClipTrailError (ADAPTER_*), never crash the caller.
 *
 * `PowerShellClipboardSource` is the Windows implementation. Scripts go in via
 * -EncodedCommand and clipboard text crosses the process boundary as base64
 * UTF-8, so quotes, newlines and non-ASCII text survive unchanged.
 *
 * @module clipboard-source
 */

import { execFile } from 'child_process';
import { ClipTrailError, ErrorCode } from '../../shared/types/errors';
import { DEFAULT_READ_TIMEOUT_MS } from '../../shared/constants';

export interface ClipboardSource {
  /** Current clipboard text; '' when the clipboard holds no text. */
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

export interface PowerShellClipboardOptions {
  /** Kill the PowerShell process after this long (ms) */
  timeoutMs?: number;
  platform?: NodeJS.Platform;
}

/** 16 MB of base64 output */
const MAX_BUFFER = 16 * 1024 * 1024;

const READ_SCRIPT = `
[Console]::OutputEncoding = [System.Text.Encoding]::UTF8
$text = Get-Clipboard -Raw
if ($text) { [Convert]::ToBase64String([System.Text.Encoding]::UTF8.GetBytes($text)) }
`.trim();

// Payload arrives on stdin; the command line stays short however large the text is.
const WRITE_SCRIPT = `
$payload = [Console]::In.ReadToEnd().Trim()
Set-Clipboard -Value ([System.Text.Encoding]::UTF8.GetString([Convert]::FromBase64String($payload)))
`.trim();

/** Encode as UTF-16LE Base64 for -EncodedCommand */
export function encodePowerShellCommand(script: string): string {
  return Buffer.from(script, 'utf16le').toString('base64');
}

export class PowerShellClipboardSource implements ClipboardSource {
  private readonly command: string;
  private timeoutMs: number;

  constructor(options: PowerShellClipboardOptions = {}) {
    const platform = options.platform ?? process.platform;
    this.command = platform === 'win32' ? 'powershell' : 'pwsh';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
  }

  setTimeout(timeoutMs: number): void {
    this.timeoutMs = timeoutMs;
  }

  async read(): Promise<string> {
    const stdout = await this.run(READ_SCRIPT, ErrorCode.ADAPTER_READ_ERROR);
    const encoded = stdout.trim();
    return encoded ? Buffer.from(encoded, 'base64').toString('utf8') : '';
  }

  async write(text: string): Promise<void> {
    await this.run(WRITE_SCRIPT, ErrorCode.ADAPTER_WRITE_ERROR, Buffer.from(text, 'utf8').toString('base64'));
  }

  private run(script: string, code: ErrorCode, input?: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = execFile(
        this.command,
        ['-NoProfile', '-NonInteractive', '-EncodedCommand', encodePowerShellCommand(script)],
        { timeout: this.timeoutMs, windowsHide: true, maxBuffer: MAX_BUFFER },
        (error, stdout) => {
          if (error) {
            reject(this.toAdapterError(error, error.killed === true ? ErrorCode.ADAPTER_TIMEOUT : code));
            return;
          }
          resolve(stdout);
        },
      );

      // EPIPE when PowerShell exits before reading its input
      child.stdin?.on('error', (error) => reject(this.toAdapterError(error, code)));
      // Closing stdin keeps PowerShell from waiting on it
      child.stdin?.end(input ?? '');
    });
  }

  private toAdapterError(error: Error, code: ErrorCode): ClipTrailError {
    const message =
      code === ErrorCode.ADAPTER_TIMEOUT
        ? `Clipboard access timed out after ${this.timeoutMs}ms`
        : `Clipboard access failed: ${error.message}`;
    return new ClipTrailError(message, code, {
      severity: 'warning',
      recoverable: true,
      originalError: error,
      context: { command: this.command },
    });
  }
}
