// Network connectivity monitoring.
//
// Monitors report network status changes to registered callbacks. The call
// registry listens to one and abandons in-flight calls when the network
// changes, since their connections are unlikely to survive it.

/** Network status as seen by a monitor. */
export type NetworkStatus = "available" | "unavailable";

export type ConnectivityCallback = (status: NetworkStatus) => void;

/**
 * Base monitor: keeps the last known status and invokes callbacks only when
 * it actually changes.
 */
export abstract class ConnectivityMonitor {
  private callbacks: ConnectivityCallback[] = [];
  private status: NetworkStatus | null = null;

  /** Register a callback for status changes. */
  addCallback(callback: ConnectivityCallback): void {
    this.callbacks.push(callback);
  }

  /** The last known status, or null if none has been reported. */
  currentStatus(): NetworkStatus | null {
    return this.status;
  }

  /** Record the starting status without notifying anyone. */
  protected setInitialStatus(status: NetworkStatus): void {
    this.status = status;
  }

  /** Record a status and notify callbacks if it differs from the last one. */
  protected maybeInvokeCallbacks(status: NetworkStatus): void {
    if (status === this.status) return;
    this.status = status;
    for (const callback of [...this.callbacks]) {
      callback(status);
    }
  }
}

/** Monitor that never reports a change. */
export class NoOpConnectivityMonitor extends ConnectivityMonitor {}

/**
 * Monitor driven by the host, which calls `setStatus` from whatever network
 * signal it has.
 */
export class ManualConnectivityMonitor extends ConnectivityMonitor {
  constructor(initial: NetworkStatus = "available") {
    super();
    this.setInitialStatus(initial);
  }

  setStatus(status: NetworkStatus): void {
    this.maybeInvokeCallbacks(status);
  }
}
