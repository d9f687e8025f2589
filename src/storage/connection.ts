// Владелец клиента индекса: создание, проверка, переподключение, закрытие.

export interface ClientLifecycle<T> {
  create(): T;
  // Проверка соединения; ошибка означает, что клиент непригоден.
  probe?(client: T): Promise<void>;
  dispose(client: T): Promise<void>;
}

/**
 * Держит один клиент на процесс.
 * reconnect(stale) выполняется в одном экземпляре: параллельные вызовы ждут
 * один и тот же промис, а вызов с уже заменённым клиентом сразу получает новый.
 */
export class ClientManager<T> {
  private client: T | null = null;
  private reconnecting: Promise<T> | null = null;
  private closed = false;

  constructor(private lifecycle: ClientLifecycle<T>) {}

  get(): T {
    if (this.closed) {
      throw new Error('Client manager is closed');
    }
    if (this.client === null) {
      this.client = this.lifecycle.create();
    }
    return this.client;
  }

  async reconnect(stale: T): Promise<T> {
    if (this.closed) {
      throw new Error('Client manager is closed');
    }
    if (this.client !== null && this.client !== stale) {
      return this.client;
    }
    if (this.reconnecting) {
      return this.reconnecting;
    }

    this.reconnecting = this.replace(stale).finally(() => {
      this.reconnecting = null;
    });
    return this.reconnecting;
  }

  async close(): Promise<void> {
    this.closed = true;
    const current = this.client;
    this.client = null;
    if (current !== null) {
      await this.lifecycle.dispose(current);
    }
  }

  private async replace(stale: T): Promise<T> {
    const fresh = this.lifecycle.create();
    if (this.lifecycle.probe) {
      try {
        await this.lifecycle.probe(fresh);
      } catch (error) {
        await this.disposeQuietly(fresh);
        throw error;
      }
    }

    this.client = fresh;
    await this.disposeQuietly(stale);
    return fresh;
  }

  private async disposeQuietly(client: T): Promise<void> {
    try {
      await this.lifecycle.dispose(client);
    } catch (error) {
      console.warn('[storage] Failed to dispose client:', error);
    }
  }
}
