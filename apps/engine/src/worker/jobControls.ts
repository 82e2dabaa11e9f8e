/** Abort handles for the jobs this process is running, by job id. */
export class JobControls {
  private readonly controllers = new Map<string, AbortController>();

  get size() {
    return this.controllers.size;
  }

  register(jobId: string) {
    const controller = new AbortController();
    this.controllers.set(jobId, controller);
    return controller;
  }

  release(jobId: string) {
    this.controllers.delete(jobId);
  }

  has(jobId: string) {
    return this.controllers.has(jobId);
  }

  /** False when the job is not running here. */
  abort(jobId: string, reason: Error) {
    const controller = this.controllers.get(jobId);
    if (!controller) {
      return false;
    }
    controller.abort(reason);
    return true;
  }
}
