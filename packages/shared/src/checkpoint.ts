/**
 * State that can be rolled back when a request aborts.
 *
 * `checkpoint()` captures the current state and returns a function that puts
 * it back. Restoring is synchronous and may be called at most once.
 */
export interface Checkpointable {
  checkpoint(): () => void;
}

export function isCheckpointable(value: unknown): value is Checkpointable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'checkpoint' in value &&
    typeof value.checkpoint === 'function'
  );
}
