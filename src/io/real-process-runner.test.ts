import { describe, it, expect } from 'vitest';
import { TailBuffer } from './real-process-runner';

describe('TailBuffer', () => {
  it('should keep a multibyte character split across chunks intact', () => {
    const tail = new TailBuffer();
    const bytes = Buffer.from('aé\nb', 'utf8');

    expect(tail.write(bytes.subarray(0, 2))).toBe('a');
    expect(tail.write(bytes.subarray(2))).toBe('é\nb');
    expect(tail.getLines()).toEqual(['aé', 'b']);
  });

  it('should keep only the last lines', () => {
    const tail = new TailBuffer(2);

    tail.write(Buffer.from('x\ny\nz\n', 'utf8'));

    expect(tail.getLines()).toEqual(['y', 'z']);
  });
});
