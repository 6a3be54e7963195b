import type { ActivationSource } from './dragOut';

type FocusTarget = Pick<Window, 'addEventListener' | 'removeEventListener'>;

/** Foreground activation as seen from inside the window: its `focus` event. */
export const windowFocusActivation = (target: FocusTarget): ActivationSource => ({
  onDidBecomeActive(listener) {
    const handleFocus = () => listener();
    target.addEventListener('focus', handleFocus);
    return () => target.removeEventListener('focus', handleFocus);
  },
});
