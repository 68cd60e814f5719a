import chokidar, { type FSWatcher } from "chokidar";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("cmlog/watcher");

/**
 * Waits for a followed file to change.
 */
export type GrowthWatcher = {
  /**
   * Resolves on the next change event, after `timeoutMs`, or when `signal`
   * aborts, whichever comes first. A change seen since the last wait resolves
   * immediately.
   */
  waitForChange: (timeoutMs: number, signal?: AbortSignal) => Promise<void>;
  close: () => Promise<void>;
};

/**
 * Options for the growth watcher.
 */
export type GrowthWatcherOptions = {
  /** Disable change events; waits then only end on timeout or abort */
  watch?: boolean;
  /** Use stat polling instead of native events (network shares) */
  usePolling?: boolean;
};

/** Stat interval when usePolling is set */
const POLLING_INTERVAL = 100;

/**
 * Creates a watcher for a single log file.
 */
export function createGrowthWatcher(
  file: string,
  options: GrowthWatcherOptions = {},
): GrowthWatcher {
  const waiters = new Set<() => void>();
  let changed = false;
  let watcher: FSWatcher | null = null;

  const notify = (eventType: string) => {
    log.debug(`File ${eventType}: ${file}`);
    changed = true;
    for (const wake of Array.from(waiters)) {
      wake();
    }
  };

  if (options.watch !== false) {
    watcher = chokidar.watch(file, {
      ignoreInitial: true,
      persistent: true,
      usePolling: options.usePolling ?? false,
      interval: POLLING_INTERVAL,
    });
    watcher.on("change", () => notify("change"));
    watcher.on("unlink", () => notify("unlink"));
    watcher.on("add", () => notify("add"));
    watcher.on("error", (error) => {
      log.error(`Watcher error: ${String(error)}`);
    });
  }

  const waitForChange = (timeoutMs: number, signal?: AbortSignal): Promise<void> => {
    if (changed || signal?.aborted) {
      changed = false;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", wake);
        waiters.delete(wake);
        changed = false;
        resolve();
      };
      const timer = setTimeout(wake, timeoutMs);
      waiters.add(wake);
      signal?.addEventListener("abort", wake, { once: true });
    });
  };

  const close = async () => {
    for (const wake of Array.from(waiters)) {
      wake();
    }
    if (watcher) {
      const closing = watcher;
      watcher = null;
      await closing.close();
    }
  };

  return { waitForChange, close };
}
