/**
 * Opaque reference to the window that receives synthesized keystrokes.
 * Acquired once before processing starts; the engine never re-acquires it itself.
 */
export interface TargetHandle {
  readonly id: string;
  readonly name?: string;
  readonly windowClass?: string;
}
