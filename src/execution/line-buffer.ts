export interface LineBuffer {
  write(chunk: string): void;
  flush(): void;
}

export function createLineBuffer(onLine: (line: string) => void): LineBuffer {
  let buffer = '';

  return {
    write(chunk: string) {
      buffer += chunk;

      // Split into complete lines; keep the last partial line in buffer.
      const parts = buffer.split(/\r?\n/);
      buffer = parts.pop() ?? '';

      for (const part of parts) {
        onLine(part);
      }
    },
    flush() {
      const remaining = buffer;
      buffer = '';
      if (remaining.length > 0) onLine(remaining);
    },
  };
}
