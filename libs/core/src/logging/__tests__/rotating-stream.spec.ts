import * as fs from 'node:fs';
import * as path from 'node:path';
import { RotatingFileStream } from '../rotating-stream';
import { makeTmpDir, removeDir } from '../../__tests__/helpers';

function line(n: number): string {
  return `${JSON.stringify({ n, pad: 'x'.repeat(40) })}\n`;
}

describe('RotatingFileStream', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = makeTmpDir('rotate-test-');
    file = path.join(dir, 'logs', 'idlewipe.log');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('creates the directory and appends lines', () => {
    const stream = new RotatingFileStream({ filePath: file });
    stream.write(line(1));
    stream.write(line(2));
    stream.close();

    expect(fs.readFileSync(file, 'utf-8')).toBe(line(1) + line(2));
  });

  it('rotates before a line would exceed the size limit and keeps maxFiles generations', () => {
    const stream = new RotatingFileStream({ filePath: file, maxFileSize: 80, maxFiles: 3 });
    for (let n = 1; n <= 5; n++) stream.write(line(n));
    stream.close();

    expect(fs.readFileSync(file, 'utf-8')).toBe(line(5));
    expect(fs.readFileSync(`${file}.1`, 'utf-8')).toBe(line(4));
    expect(fs.readFileSync(`${file}.2`, 'utf-8')).toBe(line(3));
    expect(fs.existsSync(`${file}.3`)).toBe(false);
  });

  it('counts what an earlier run already wrote', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, line(0));

    const stream = new RotatingFileStream({ filePath: file, maxFileSize: 80 });
    stream.write(line(1));
    stream.close();

    expect(fs.readFileSync(`${file}.1`, 'utf-8')).toBe(line(0));
    expect(fs.readFileSync(file, 'utf-8')).toBe(line(1));
  });

  it('writes a line larger than the limit to an empty file', () => {
    const stream = new RotatingFileStream({ filePath: file, maxFileSize: 10 });
    stream.write(line(1));
    stream.close();

    expect(fs.readFileSync(file, 'utf-8')).toBe(line(1));
    expect(fs.existsSync(`${file}.1`)).toBe(false);
  });

  it('starts a fresh file when another process rotated the live one away', () => {
    const stream = new RotatingFileStream({ filePath: file, maxFileSize: 80, maxFiles: 3 });
    stream.write(line(1));
    fs.renameSync(file, `${file}.other`);

    expect(() => stream.write(line(2))).not.toThrow();
    stream.close();

    expect(fs.readFileSync(file, 'utf-8')).toBe(line(2));
    expect(fs.readFileSync(`${file}.other`, 'utf-8')).toBe(line(1));
    expect(fs.existsSync(`${file}.1`)).toBe(false);
    expect(stream.droppedLines).toBe(0);
  });

  it('drops a line it cannot write instead of throwing', () => {
    const stream = new RotatingFileStream({ filePath: file, maxFileSize: 80, maxFiles: 3 });
    stream.write(line(1));
    fs.rmSync(path.dirname(file), { recursive: true, force: true });
    fs.writeFileSync(path.dirname(file), 'not a directory');

    expect(() => stream.write(line(2))).not.toThrow();
    expect(() => stream.write(line(3))).not.toThrow();

    expect(stream.droppedLines).toBe(2);
    expect(stream.lastError).toMatchObject({ code: 'ENOTDIR' });
    stream.close();
  });
});
