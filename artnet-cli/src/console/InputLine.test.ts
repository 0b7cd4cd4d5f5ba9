import { describe, it, expect } from 'vitest';
import { InputLine } from './InputLine';

describe('InputLine', () => {
  it('edits text', () => {
    const line = new InputLine();
    line.insert('statu');
    line.insert('ss');
    line.backspace();
    expect(line.text).toBe('status');
  });

  it('submit returns the line and resets it', () => {
    const line = new InputLine();
    line.insert('health');
    expect(line.submit()).toBe('health');
    expect(line.isEmpty).toBe(true);
  });

  it('recalls submitted lines', () => {
    const line = new InputLine();
    line.insert('status');
    line.submit();
    line.insert('devices');
    line.submit();

    line.recall(-1);
    expect(line.text).toBe('devices');
    line.recall(-1);
    expect(line.text).toBe('status');
    line.recall(-1);
    expect(line.text).toBe('status');
    line.recall(1);
    expect(line.text).toBe('devices');
    line.recall(1);
    expect(line.text).toBe('');
  });

  it('skips blank lines and consecutive duplicates in history', () => {
    const line = new InputLine();
    for (const text of ['status', 'status', '  ']) {
      line.insert(text);
      line.submit();
    }
    line.recall(-1);
    expect(line.text).toBe('status');
    line.recall(-1);
    expect(line.text).toBe('status');
    line.recall(1);
    expect(line.text).toBe('');
  });
});
