/**
 * Serializes tasks per chat: a task starts only after the previous task for
 * the same chat settled. Tasks for different chats run concurrently.
 */
export class ChatTaskQueue {
  private readonly tails = new Map<number, Promise<void>>();

  run<T>(chatId: number, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(chatId) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    this.tails.set(chatId, tail);
    void tail.then(() => {
      if (this.tails.get(chatId) === tail) {
        this.tails.delete(chatId);
      }
    });

    return result;
  }
}
