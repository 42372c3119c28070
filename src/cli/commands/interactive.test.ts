import { isExitCommand } from './interactive.js';

describe('isExitCommand', () => {
  it.each(['exit', 'quit', 'q', '  EXIT  ', 'Quit'])('treats %p as a request to leave', (line) => {
    expect(isExitCommand(line)).toBe(true);
  });

  it.each(['', 'exit now', 'question'])('keeps going on %p', (line) => {
    expect(isExitCommand(line)).toBe(false);
  });
});
