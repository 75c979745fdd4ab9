type InterruptListener = () => void;

/**
 * SIGINT routing for the CLI.
 *
 * Only the most recently registered listener is notified, so an open prompt can turn an
 * interrupt into a cancellation while the entry point's listener covers everything else.
 */
const listeners: InterruptListener[] = [];

const dispatch = (): void => {
  const listener = listeners[listeners.length - 1];
  if (listener) listener();
};

/**
 * Registers a listener and returns the function that removes it again.
 */
export const onInterrupt = (listener: InterruptListener): (() => void) => {
  listeners.push(listener);
  if (listeners.length === 1) {
    process.on('SIGINT', dispatch);
  }

  return () => {
    const index = listeners.lastIndexOf(listener);
    if (index === -1) return;
    listeners.splice(index, 1);
    if (listeners.length === 0) {
      process.off('SIGINT', dispatch);
    }
  };
};
