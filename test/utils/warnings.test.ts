import { config } from '../../src/config';
import { onceWarn } from '../../src/utils/warnings';

describe('onceWarn', () => {
  test('stays silent while warnings are disabled', () => {
    // Arrange
    const warn = jest.spyOn(console, 'warn');
    // Act
    const emitted = onceWarn('disabled', 'hidden');
    // Assert
    expect(emitted).toBe(false);
    expect(warn).not.toHaveBeenCalled();
    warn.mockRestore();
  });

  test('emits a key only once when enabled', () => {
    // Arrange
    config.warnings = true;
    const warn = jest.spyOn(console, 'warn');
    // Act
    onceWarn('repeat', 'first');
    onceWarn('repeat', 'second');
    // Assert
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('first');
    warn.mockRestore();
  });
});
