import { describe, expect, test } from 'vitest';
import { dismissOpenDatepicker } from '../../../../src/engine/html/datepicker.js';
import { createFakePage } from './fakePage.js';

describe('dismissOpenDatepicker', () => {
  test('runs the in-page close and then presses Escape', async () => {
    const { page, mock } = createFakePage({});

    await dismissOpenDatepicker(page);

    expect(mock.evaluate).toHaveBeenCalledTimes(1);
    expect(mock.keyboard.press).toHaveBeenCalledWith('Escape');
  });

  test('a failing step does not stop the next one or the caller', async () => {
    const { page, mock } = createFakePage({});
    mock.evaluate.mockRejectedValueOnce(new Error('Execution context was destroyed'));
    mock.keyboard.press.mockRejectedValueOnce(new Error('Target closed'));

    await expect(dismissOpenDatepicker(page)).resolves.toBeUndefined();
    expect(mock.keyboard.press).toHaveBeenCalledWith('Escape');
  });
});
