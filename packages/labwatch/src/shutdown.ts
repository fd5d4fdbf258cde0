type ShutdownHook = () => void;

let _requested = false;
const _hooks = new Set<ShutdownHook>();

/** Flag a graceful shutdown and notify registered hooks once. */
export function requestShutdown(): void {
  if (_requested) return;
  _requested = true;
  for (const hook of _hooks) hook();
}

export function isShutdownRequested(): boolean {
  return _requested;
}

/** Register a hook run on shutdown; returns an unregister function. */
export function onShutdown(hook: ShutdownHook): () => void {
  _hooks.add(hook);
  return () => { _hooks.delete(hook); };
}
