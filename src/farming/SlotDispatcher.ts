import type { Clock } from '../core/Clock';
import { SLOT_COUNT } from '../core/Config';
import { createLogger } from '../core/Logger';
import type { MovementCoordinator } from './Movement';

const Logger = createLogger('Slots');

/**
 * Отправка слотов с учётом кулдаунов. Время последнего использования хранится в таблице фиксированного размера.
 */
export class SlotDispatcher {
  private readonly lastUsed: Array<number | null> = new Array<number | null>(SLOT_COUNT).fill(null);

  constructor(private readonly movement: MovementCoordinator, private readonly clock: Clock) {}

  isValid(slot: number): boolean {
    return Number.isInteger(slot) && slot >= 0 && slot < SLOT_COUNT;
  }

  isReady(slot: number, cooldowns: readonly number[]): boolean {
    if (!this.isValid(slot)) return false;
    const last = this.lastUsed[slot];
    if (last === null) return true;
    return this.clock.now() - last >= (cooldowns[slot] ?? 0);
  }

  /** Нажимает слот, если он не на кулдауне. */
  async send(slot: number, cooldowns: readonly number[]): Promise<boolean> {
    if (!this.isValid(slot)) {
      Logger.warn(`слот ${slot} вне диапазона 0..${SLOT_COUNT - 1}`);
      return false;
    }
    if (!this.isReady(slot, cooldowns)) return false;
    await this.movement.useSlot(slot);
    this.lastUsed[slot] = this.clock.now();
    return true;
  }

  /**
   * Нажимает первый готовый слот из списка; пустой список ничего не делает.
   * @returns Нажатый слот или null
   */
  async useFirstReady(slots: readonly number[], cooldowns: readonly number[]): Promise<number | null> {
    for (const s of slots) {
      if (await this.send(s, cooldowns)) return s;
    }
    return null;
  }
}
