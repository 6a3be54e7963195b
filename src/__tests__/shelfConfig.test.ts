/** @jest-environment node */
import { resolveShelfConfig } from '../main/shelfConfig';

describe('resolveShelfConfig', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('defaults to the reactivation heuristic with the drop area shown', () => {
    expect(resolveShelfConfig(undefined, {})).toEqual({
      dragCompletion: 'reactivation',
      showDropAreaOnLaunch: true,
      maxDisplayNameLength: 40,
    });
  });

  it('reads settings from the environment', () => {
    const config = resolveShelfConfig(undefined, {
      SHELF_DRAG_COMPLETION: ' Completion-Callback ',
      SHELF_SHOW_DROP_AREA: 'off',
      SHELF_MAX_NAME_LENGTH: '24',
    });

    expect(config).toEqual({
      dragCompletion: 'completion-callback',
      showDropAreaOnLaunch: false,
      maxDisplayNameLength: 24,
    });
  });

  it('falls back to defaults for values it cannot parse', () => {
    const config = resolveShelfConfig(undefined, {
      SHELF_DRAG_COMPLETION: 'sideways',
      SHELF_SHOW_DROP_AREA: 'maybe',
      SHELF_MAX_NAME_LENGTH: '2.5',
    });

    expect(config).toEqual({
      dragCompletion: 'reactivation',
      showDropAreaOnLaunch: true,
      maxDisplayNameLength: 40,
    });
    expect(resolveShelfConfig(undefined, { SHELF_MAX_NAME_LENGTH: '-3' }).maxDisplayNameLength).toBe(40);
  });

  it('lets explicit overrides win over the environment', () => {
    const config = resolveShelfConfig(
      { showDropAreaOnLaunch: true, dragCompletion: 'reactivation' },
      { SHELF_SHOW_DROP_AREA: '0', SHELF_DRAG_COMPLETION: 'completion-callback' },
    );

    expect(config.showDropAreaOnLaunch).toBe(true);
    expect(config.dragCompletion).toBe('reactivation');
  });
});
