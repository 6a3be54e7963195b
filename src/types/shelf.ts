export type DragCompletionStrategy = 'reactivation' | 'completion-callback';

export interface ShelfConfig {
  /** How an outbound drag is judged complete */
  dragCompletion: DragCompletionStrategy;
  /** Whether the drop area starts expanded */
  showDropAreaOnLaunch: boolean;
  /** Names longer than this are truncated in the middle */
  maxDisplayNameLength: number;
}
