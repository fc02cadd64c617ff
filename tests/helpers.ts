import type { Actuator } from '../src/core/Actions';
import type { ImageDataLike } from '../src/core/Capture';
import type { Clock } from '../src/core/Clock';
import type { Rgb } from '../src/core/Color';
import type { DetectionSettings } from '../src/core/Config';
import type { Point } from '../src/core/Geometry';
import type { Target } from '../src/core/Mobs';
import type { AliveState, Perception, PerceptionSnapshot } from '../src/core/ScreenAnalyzer';
import type { StatusBarKind, StatusBarSnapshot } from '../src/core/StatusBar';

/** Чёрный непрозрачный кадр. */
export function makeFrame(width: number, height: number): ImageDataLike {
  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 3; i < data.length; i += 4) data[i] = 255;
  return { data, width, height };
}

export function setPixel(img: ImageDataLike, x: number, y: number, c: Rgb, a = 255): void {
  const idx = (y * img.width + x) * 4;
  img.data[idx] = c[0]; img.data[idx + 1] = c[1]; img.data[idx + 2] = c[2]; img.data[idx + 3] = a;
}

/** Закрашивает пиксели [x, x+w) × [y, y+h). */
export function fillRect(img: ImageDataLike, x: number, y: number, w: number, h: number, c: Rgb): void {
  for (let yy = y; yy < y + h; yy++) {
    for (let xx = x; xx < x + w; xx++) setPixel(img, xx, yy, c);
  }
}

/** Ручные часы: sleep() мгновенно сдвигает время. */
export class ManualClock implements Clock {
  constructor(public t = 1_000_000) {}
  now(): number { return this.t; }
  async sleep(ms: number): Promise<void> { this.t += Math.max(0, ms); }
  advance(ms: number): void { this.t += ms; }
}

/** Записывает все действия в виде строк: "click 10,20", "press z", "hold w", "release w". */
export class RecordingActuator implements Actuator {
  readonly log: string[] = [];
  async click(p: Point): Promise<void> { this.log.push(`click ${p.x},${p.y}`); }
  async pressKey(key: string): Promise<void> { this.log.push(`press ${key}`); }
  async holdKey(key: string): Promise<void> { this.log.push(`hold ${key}`); }
  async releaseKey(key: string): Promise<void> { this.log.push(`release ${key}`); }
  async useSlot(slot: number): Promise<void> { this.log.push(`press ${slot}`); }
  clear(): void { this.log.length = 0; }
}

function bar(kind: StatusBarKind, percentage: number | null): StatusBarSnapshot {
  return {
    kind,
    percentage: percentage ?? 0,
    width: percentage ?? 0,
    runningMaxWidth: 100,
    detected: percentage !== null,
    bounds: null,
    lastMeasuredAt: null,
    lastChangedAt: 0,
  };
}

export interface ViewSpec {
  hp?: number | null;
  mp?: number | null;
  fp?: number | null;
  targetHp?: number | null;
  targetMp?: number | null;
  alive?: AliveState;
  marker?: Point | null;
  staleMs?: number;
}

/** Снимок восприятия для экрана 800x600. null в полосе: полоса не найдена. */
export function makeView(spec: ViewSpec = {}): PerceptionSnapshot {
  const targetHp = spec.targetHp === undefined ? null : spec.targetHp;
  const targetMp = spec.targetMp === undefined ? null : spec.targetMp;
  const marker = spec.marker === undefined ? null : spec.marker;
  const screenCenter = { x: 400, y: 300 };
  const dist = marker ? Math.hypot(marker.x - screenCenter.x, marker.y - screenCenter.y) : Number.POSITIVE_INFINITY;
  return {
    at: 0,
    frameWidth: 800,
    frameHeight: 600,
    screenCenter,
    bars: {
      hp: bar('hp', spec.hp === undefined ? 100 : spec.hp),
      mp: bar('mp', spec.mp === undefined ? 100 : spec.mp),
      fp: bar('fp', spec.fp === undefined ? 100 : spec.fp),
      targetHp: bar('targetHp', targetHp),
      targetMp: bar('targetMp', targetMp),
    },
    trayOpen: spec.alive !== 'trayClosed',
    alive: spec.alive ?? 'alive',
    trayReopenDue: false,
    target: {
      onScreen: marker !== null,
      marker,
      markerColor: marker ? 'blue' : null,
      distance: dist,
      alive: targetHp !== null && targetHp > 0,
      npc: false,
      mover: false,
    },
    targetHpStaleMs: spec.staleMs ?? 0,
  };
}

/** Восприятие по сценарию: тест сам выставляет, что «видно» на следующем тике. */
export class StubPerception implements Perception {
  view: PerceptionSnapshot = makeView();
  mobs: Target[] = [];
  staleResets = 0;
  findCalls = 0;

  refresh(_frame: ImageDataLike, _cfg: DetectionSettings): PerceptionSnapshot {
    return this.view;
  }

  findMobs(_frame: ImageDataLike, _cfg: DetectionSettings): Target[] {
    this.findCalls++;
    return this.mobs;
  }

  resetTargetStaleness(): void {
    this.staleResets++;
    this.view = { ...this.view, targetHpStaleMs: 0 };
  }
}

export function mob(type: Target['type'], x: number, y: number, width = 40, height = 6): Target {
  return { type, bbox: { x, y, width, height } };
}
