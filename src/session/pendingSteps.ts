export type PendingStepKind = 'await_search_query';

/**
 * Per-chat marker that the next plain-text message continues a multi-step
 * command. Process-local and never expires.
 *
 * `take` reads and removes in one synchronous step, so concurrent updates for
 * other chats cannot observe or clobber an entry mid-consume.
 */
export class PendingSteps {
  readonly #steps = new Map<number, PendingStepKind>();

  set(chatId: number, step: PendingStepKind): void {
    this.#steps.set(chatId, step);
  }

  take(chatId: number): PendingStepKind | undefined {
    const step = this.#steps.get(chatId);
    if (step !== undefined) {
      this.#steps.delete(chatId);
    }
    return step;
  }
}
