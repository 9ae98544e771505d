import fs from 'fs';
import os from 'os';
import path from 'path';
import { captureConsole } from '../src/utils/logger/fileLogger.js';

async function readWhenWritten(file: string, timeoutMs = 1000): Promise<string> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (fs.existsSync(file)) {
      const content = fs.readFileSync(file, 'utf-8');
      if (content !== '') return content;
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  throw new Error(`Nothing written to ${file}`);
}

describe('captureConsole', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pacewatch-console-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should mirror console output into the log file and restore the console', async () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const logFile = path.join(dir, 'logs', 'app.log');

    const restore = captureConsole({ logFile });
    console.log('hello', 42);
    restore();

    expect(logSpy).toHaveBeenCalledWith('hello', 42);
    expect(console.log).toBe(logSpy);
    expect(await readWhenWritten(logFile)).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[LOG\] hello 42\n$/);
  });
});
