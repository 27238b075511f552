/**
 * Guard anti-overlap avec coalescing : au plus un travail en vol,
 * un appel concurrent reçoit la promesse déjà en cours.
 */
export class CycleGuard<T> {
  private inFlight: Promise<T> | null = null;

  private counters = {
    runs: 0,
    coalesced: 0
  };

  async run(work: () => Promise<T>): Promise<T> {
    if (this.inFlight) {
      this.counters.coalesced++;
      return this.inFlight;
    }

    this.counters.runs++;
    // work démarre au tick suivant, après l'affectation d'inFlight
    const current = Promise.resolve()
      .then(work)
      .finally(() => {
        this.inFlight = null;
      });

    this.inFlight = current;
    return current;
  }

  isActive(): boolean {
    return this.inFlight !== null;
  }

  getCounters(): { runs: number; coalesced: number } {
    return { ...this.counters };
  }
}
