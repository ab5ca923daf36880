import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';

// ─── Mocks ───
const mockExecFile = vi.fn();

vi.mock('child_process', () => ({
  execFile: (...args: unknown[]) => mockExecFile(...args),
}));

import { PowerShellClipboardSource, encodePowerShellCommand } from '../src/main/services/clipboard-source';
import { ClipTrailError, ErrorCode } from '../src/shared/types/errors';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

class FakeStdin extends EventEmitter {
  end = vi.fn();
}

interface FakeChild {
  stdin: FakeStdin;
}

let children: FakeChild[] = [];

/**
 * Make the next execFile call finish with the given outcome. A `stdinError`
 * is emitted on stdin as soon as the adapter closes it.
 */
function respond(stdout: string, error: Error | null = null, stdinError: Error | null = null): void {
  mockExecFile.mockImplementationOnce((_cmd: string, _args: string[], _opts: object, cb: ExecCallback) => {
    const child: FakeChild = { stdin: new FakeStdin() };
    if (stdinError) {
      child.stdin.end.mockImplementation(() => {
        child.stdin.emit('error', stdinError);
      });
    }
    children.push(child);
    setImmediate(() => cb(error, error ? '' : stdout, ''));
    return child;
  });
}

function lastCall(): { command: string; args: string[]; options: Record<string, unknown> } {
  const call = mockExecFile.mock.calls[mockExecFile.mock.calls.length - 1];
  return { command: call[0], args: call[1], options: call[2] };
}

function decodedScript(): string {
  const args = lastCall().args;
  return Buffer.from(args[args.length - 1], 'base64').toString('utf16le');
}

beforeEach(() => {
  mockExecFile.mockReset();
  children = [];
});

// =============================================================================
// encodePowerShellCommand
// =============================================================================
describe('encodePowerShellCommand', () => {
  it('encodes the script as UTF-16LE base64', () => {
    expect(encodePowerShellCommand('Get-Date')).toBe('RwBlAHQALQBEAGEAdABlAA==');
  });
});

// =============================================================================
// read
// =============================================================================
describe('PowerShellClipboardSource.read', () => {
  it('decodes base64 UTF-8 output', async () => {
    const text = 'naïve "café"\nline two';
    respond(Buffer.from(text, 'utf8').toString('base64') + '\r\n');

    const source = new PowerShellClipboardSource({ platform: 'win32' });
    expect(await source.read()).toBe(text);
  });

  it('returns an empty string when the clipboard holds no text', async () => {
    respond('\r\n');
    const source = new PowerShellClipboardSource({ platform: 'win32' });
    expect(await source.read()).toBe('');
  });

  it('runs Windows PowerShell on win32 with an encoded script', async () => {
    respond('');
    const source = new PowerShellClipboardSource({ platform: 'win32', timeoutMs: 1500 });
    await source.read();

    const { command, args, options } = lastCall();
    expect(command).toBe('powershell');
    expect(args.slice(0, 3)).toEqual(['-NoProfile', '-NonInteractive', '-EncodedCommand']);
    expect(decodedScript()).toContain('Get-Clipboard -Raw');
    expect(options).toMatchObject({ timeout: 1500, windowsHide: true });
    expect(children[0].stdin.end).toHaveBeenCalledWith('');
  });

  it('runs pwsh on other platforms', async () => {
    respond('');
    await new PowerShellClipboardSource({ platform: 'linux' }).read();
    expect(lastCall().command).toBe('pwsh');
  });

  it('setTimeout() changes the limit for later calls', async () => {
    respond('');
    const source = new PowerShellClipboardSource({ platform: 'win32', timeoutMs: 1500 });
    source.setTimeout(4000);
    await source.read();
    expect(lastCall().options.timeout).toBe(4000);
  });

  it('rejects with ADAPTER_READ_ERROR when PowerShell fails', async () => {
    respond('', new Error('spawn pwsh ENOENT'));
    const source = new PowerShellClipboardSource({ platform: 'linux' });

    const error = await source.read().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ClipTrailError);
    expect(error).toMatchObject({
      code: ErrorCode.ADAPTER_READ_ERROR,
      message: 'Clipboard access failed: spawn pwsh ENOENT',
      recoverable: true,
      severity: 'warning',
      context: { command: 'pwsh' },
    });
  });

  it('rejects with ADAPTER_TIMEOUT when the process was killed', async () => {
    respond('', Object.assign(new Error('Command failed'), { killed: true }));
    const source = new PowerShellClipboardSource({ platform: 'win32', timeoutMs: 1500 });

    await expect(source.read()).rejects.toMatchObject({
      code: ErrorCode.ADAPTER_TIMEOUT,
      message: 'Clipboard access timed out after 1500ms',
    });
  });
});

// =============================================================================
// write
// =============================================================================
describe('PowerShellClipboardSource.write', () => {
  it('sends the text as base64 over stdin', async () => {
    respond('');
    const source = new PowerShellClipboardSource({ platform: 'win32' });
    await source.write('hi ✓');

    expect(decodedScript()).toContain('Set-Clipboard');
    expect(children[0].stdin.end).toHaveBeenCalledWith('aGkg4pyT');
  });

  it('rejects with ADAPTER_WRITE_ERROR when PowerShell fails', async () => {
    respond('', new Error('Access denied'));
    const source = new PowerShellClipboardSource({ platform: 'win32' });

    await expect(source.write('x')).rejects.toMatchObject({ code: ErrorCode.ADAPTER_WRITE_ERROR });
  });

  it('rejects with ADAPTER_WRITE_ERROR when stdin breaks before PowerShell reads it', async () => {
    respond('', null, Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }));
    const source = new PowerShellClipboardSource({ platform: 'win32' });

    const result = source.write('x');

    expect(children[0].stdin.listenerCount('error')).toBe(1);
    await expect(result).rejects.toMatchObject({
      code: ErrorCode.ADAPTER_WRITE_ERROR,
      message: 'Clipboard access failed: write EPIPE',
      context: { command: 'powershell' },
    });
  });

  it('keeps the first failure when stdin breaks and the process also fails', async () => {
    respond('', new Error('Command failed: powershell'), new Error('write EPIPE'));
    const source = new PowerShellClipboardSource({ platform: 'win32' });

    await expect(source.write('x')).rejects.toMatchObject({
      code: ErrorCode.ADAPTER_WRITE_ERROR,
      message: 'Clipboard access failed: write EPIPE',
    });
  });
});
