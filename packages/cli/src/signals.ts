export interface SignalRoutingOptions {
  signals?: NodeJS.Signals[];
  /** Called on a repeated signal, once the run has already been asked to stop. */
  forceExit: () => void;
  log?: (line: string) => void;
}

/**
 * Route termination signals to the active run's controller. The first signal
 * aborts the run so teardown and the report still happen; a repeat forces exit.
 * Returns a function that removes the listeners.
 */
export function routeSignals(controller: AbortController, opts: SignalRoutingOptions): () => void {
  const signals = opts.signals ?? ["SIGINT", "SIGTERM"];
  const handler = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      opts.forceExit();
      return;
    }
    opts.log?.(`\n[mudprobe] ${signal} received, stopping (send again to quit now)...`);
    controller.abort();
  };
  for (const signal of signals) process.on(signal, handler);
  return () => {
    for (const signal of signals) process.off(signal, handler);
  };
}
