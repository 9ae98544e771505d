import fs from 'fs';
import os from 'os';
import path from 'path';
import { rotateFile } from '../src/utils/rotateFile.js';

describe('rotateFile', () => {
  let dir: string;
  const now = new Date('2026-03-10T12:00:00.000Z');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pacewatch-rotate-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should rename the file with the current date', () => {
    fs.writeFileSync(path.join(dir, 'app.log'), 'line\n');

    const result = rotateFile({ dir, filename: 'app.log', now });

    expect(result.rotatedTo).toBe(path.join(dir, 'app-2026-03-10.log'));
    expect(fs.existsSync(path.join(dir, 'app.log'))).toBe(false);
    expect(fs.readFileSync(path.join(dir, 'app-2026-03-10.log'), 'utf-8')).toBe('line\n');
  });

  it('should rotate at most once per day', () => {
    fs.writeFileSync(path.join(dir, 'app-2026-03-10.log'), 'earlier\n');
    fs.writeFileSync(path.join(dir, 'app.log'), 'later\n');

    const result = rotateFile({ dir, filename: 'app.log', now });

    expect(result.rotatedTo).toBeUndefined();
    expect(fs.existsSync(path.join(dir, 'app.log'))).toBe(true);
  });

  it('should delete rotated files past retention only', () => {
    fs.writeFileSync(path.join(dir, 'app-2026-03-01.log'), '');
    fs.writeFileSync(path.join(dir, 'app-2026-03-05.log'), '');
    fs.writeFileSync(path.join(dir, 'other-2026-01-01.log'), '');

    const result = rotateFile({ dir, filename: 'app.log', retentionDays: 7, now });

    expect(result.deleted).toEqual(['app-2026-03-01.log']);
    expect(fs.readdirSync(dir).sort()).toEqual(['app-2026-03-05.log', 'other-2026-01-01.log']);
  });

  it('should do nothing when the directory is missing', () => {
    expect(rotateFile({ dir: path.join(dir, 'missing'), filename: 'app.log', now })).toEqual({ deleted: [] });
  });
});
