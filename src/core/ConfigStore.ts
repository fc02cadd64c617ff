import { BotSettings, mergeSettings } from './Config';
import { createLogger } from './Logger';

const Logger = createLogger('ConfigStore');

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

type Listener = (settings: BotSettings) => void;

/**
 * Живые настройки. Читатели получают неизменяемый снимок (тик берёт один снимок на весь проход),
 * запись идёт через очередь: каждое обновление применяется к результату предыдущего.
 */
export class ConfigStore {
  private current: BotSettings;
  private writes: Promise<unknown> = Promise.resolve();
  private readonly listeners: Listener[] = [];

  constructor(initial: BotSettings) {
    this.current = deepFreeze(mergeSettings(initial, {}));
  }

  read(): BotSettings {
    return this.current;
  }

  /**
   * Ставит частичное обновление в очередь записи.
   * @param patch Частичный объект настроек (например, из POST /api/config)
   * @returns Снимок после применения
   */
  update(patch: unknown): Promise<BotSettings> {
    const next = this.writes.then(() => {
      this.current = deepFreeze(mergeSettings(this.current, patch));
      Logger.info('настройки обновлены');
      for (const l of this.listeners) l(this.current);
      return this.current;
    });
    // Ошибка одного обновления не должна блокировать следующие.
    this.writes = next.catch(() => undefined);
    return next;
  }

  onChange(listener: Listener): () => void {
    this.listeners.push(listener);
    return () => {
      const i = this.listeners.indexOf(listener);
      if (i >= 0) this.listeners.splice(i, 1);
    };
  }
}
