// tests/history.test.ts
import { History } from '../src/history';
import * as fs from 'fs/promises';

jest.mock('fs/promises');

describe('History', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should list entries oldest first', () => {
    const history = new History();
    history.addSuccess('1+2', 3);
    history.addFailure('1/0', 'Division by zero at column 2');
    expect(history.format()).toEqual([
      'History (newest last):',
      '  [01] 1+2  =>  3',
      '  [02] 1/0  =>  ERROR: Division by zero at column 2',
    ]);
  });

  it('should evict the oldest entry when full', () => {
    const history = new History(2);
    history.addSuccess('1', 1);
    history.addSuccess('2', 2);
    history.addSuccess('3', 3);
    expect(history.entries.map((e) => e.expression)).toEqual(['2', '3']);
  });

  it('should serialize one line per entry', () => {
    const history = new History();
    history.addSuccess('pi', Math.PI);
    history.addFailure('x', 'Undefined variable: x at column 1');
    expect(history.serialize()).toBe(
      '[01] pi = 3.14159265358979\n[02] x = ERROR(Undefined variable: x at column 1)\n'
    );
  });

  it('should write the serialized history to a file', async () => {
    jest.mocked(fs.writeFile).mockResolvedValue(undefined);
    const history = new History();
    history.addSuccess('2^10', 1024);
    await history.save('history.txt');
    expect(fs.writeFile).toHaveBeenCalledWith('history.txt', '[01] 2^10 = 1024\n', 'utf-8');
  });

  it('should clear entries', () => {
    const history = new History();
    history.addSuccess('1', 1);
    history.clear();
    expect(history.format()).toEqual(['History (newest last):']);
  });
});
