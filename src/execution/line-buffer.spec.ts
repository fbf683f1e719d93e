import { createLineBuffer } from './line-buffer';

describe('createLineBuffer', () => {
  it('emits complete lines across chunk boundaries', () => {
    const lines: string[] = [];
    const buffer = createLineBuffer((line) => lines.push(line));

    buffer.write('Compiling wid');
    buffer.write('gets v0.1.0\r\nFinished');
    expect(lines).toEqual(['Compiling widgets v0.1.0']);

    buffer.write(' dev\n');
    expect(lines).toEqual(['Compiling widgets v0.1.0', 'Finished dev']);
  });

  it('flushes a trailing partial line once', () => {
    const lines: string[] = [];
    const buffer = createLineBuffer((line) => lines.push(line));

    buffer.write('no newline');
    buffer.flush();
    buffer.flush();

    expect(lines).toEqual(['no newline']);
  });

  it('keeps empty lines', () => {
    const lines: string[] = [];
    const buffer = createLineBuffer((line) => lines.push(line));
    buffer.write('a\n\nb\n');
    expect(lines).toEqual(['a', '', 'b']);
  });
});
