import fs from 'fs';
import path from 'path';
import { ColorSpec, Rgb, isRgb } from './Color';
import type { Bounds } from './Geometry';
import { LogLevel, createLogger, errorMessage, isLogLevel } from './Logger';
import { MOB_TYPES, MobDetectionSettings } from './Mobs';
import { STATUS_BAR_KINDS, StatusBarKind, StatusBarSettings } from './StatusBar';
import { MarkerColor, TargetMarkerSettings } from './TargetMarker';

const Logger = createLogger('Config');

/** Размер панели быстрых слотов (клавиши 1..0). */
export const SLOT_COUNT = 10;

export interface CaptureSettings {
  /** Период тиков (мс). */
  intervalMs: number;
  /** Сколько ждать скриншот, прежде чем пропустить тик. */
  timeoutMs: number;
  /** Кадрирование кадра; null: весь экран. */
  roi: Bounds | null;
}

export interface ActionsSettings {
  /** Выполнять ли реальные действия или только логировать (dry-run). */
  enableActions: boolean;
  /** Пауза после клика (мс). */
  clickDelayMs: number;
}

export interface ServerSettings {
  enabled: boolean;
  port: number;
}

export interface DetectionSettings {
  mobs: MobDetectionSettings;
  bars: Record<StatusBarKind, StatusBarSettings>;
  targetMarker: TargetMarkerSettings;
  /** Через сколько тиков без панели статуса нажать T. */
  trayReopenAfter: number;
}

export interface AvoidanceSettings {
  /** Срок зоны вокруг неудачного клика. */
  clickZoneMs: number;
  /** Срок зоны вокруг маркера после безуспешного обхода препятствия. */
  markerZoneMs: number;
  markerZoneSize: number;
  /** Прирост зоны на каждую повторную неудачу в том же месте. */
  growStep: number;
  /** Клик ближе этого радиуса к прошлой неудаче считается тем же местом. */
  sameSpotRadius: number;
}

/**
 * Параметры фарма. Номера слотов 0..9; пустой список отключает функцию.
 */
export interface FarmingSettings {
  attackSlots: number[];
  aoeAttackSlots: number[];
  healSlots: number[];
  aoeHealSlots: number[];
  mpRestoreSlots: number[];
  fpRestoreSlots: number[];
  buffSlots: number[];
  partySkillSlots: number[];
  pickupSlots: number[];
  /** Слот призыва питомца-подборщика; null: не используется. */
  pickupPetSlot: number | null;
  /** Слот действия «поднять»; null: не используется. */
  pickupMotionSlot: number | null;
  /** Кулдауны слотов (мс), всегда SLOT_COUNT элементов. */
  slotCooldowns: number[];

  healThreshold: number;
  mpThreshold: number;
  fpThreshold: number;
  minHpAttack: number;

  prioritizeAggro: boolean;
  aggroGraceMs: number;
  maxEngageDistance: number;
  maxRotations: number;
  circleMoveDurationMs: number;
  obstacleAvoidanceMaxTry: number;
  obstacleAvoidanceCooldownMs: number;
  maxAoeFarming: number;
  aoeDistance: number;
  aoeTargetHp: number;
  /** 0: без ограничения. */
  mobsTimeoutMs: number;
  /** Не искать мобов: бить цель, выбранную вручную. */
  manualTargetOnly: boolean;
  verifyDelayMs: number;
  buffCastMs: number;
  avoidance: AvoidanceSettings;
}

/**
 * Глобальная конфигурация бота. Загружается из settings.jsonc в рабочей директории поверх дефолтов.
 */
export interface BotSettings {
  logLevel: LogLevel;
  capture: CaptureSettings;
  actions: ActionsSettings;
  server: ServerSettings;
  detection: DetectionSettings;
  farming: FarmingSettings;
}

const HP_SHADES: Rgb[] = [[174, 18, 55], [188, 24, 62], [204, 30, 70], [220, 36, 78]];
const MP_SHADES: Rgb[] = [[20, 84, 196], [36, 132, 220], [44, 164, 228], [56, 188, 232]];
const FP_SHADES: Rgb[] = [[45, 230, 29], [28, 172, 28], [44, 124, 52], [20, 146, 20]];

function bar(region: Bounds, colors: Rgb[], maxWidth: number): StatusBarSettings {
  return {
    region,
    colors,
    tolerance: 5,
    clusterDistanceX: 10,
    clusterDistanceY: 3,
    minWidth: 1,
    maxWidth,
    minHeight: 0,
    maxHeight: 20,
  };
}

const PLAYER_BARS: Bounds = { x: 105, y: 30, width: 120, height: 80 };

/** Дефолтные значения на случай отсутствия settings.jsonc или его полей. */
export const DEFAULT_SETTINGS: BotSettings = {
  logLevel: 'info',
  capture: { intervalMs: 1000, timeoutMs: 3000, roi: null },
  actions: { enableActions: false, clickDelayMs: 50 },
  server: { enabled: true, port: 3000 },
  detection: {
    mobs: {
      colors: {
        passive: { color: [234, 234, 149], tolerance: 5 },
        aggressive: { color: [179, 23, 23], tolerance: 5 },
        violet: { color: [182, 144, 146], tolerance: 5 },
      },
      clusterDistanceX: 50,
      clusterDistanceY: 3,
      minNameWidth: 15,
      maxNameWidth: 150,
      marginTop: 0,
      marginBottom: 100,
      minLabelY: 110,
      exclude: { x: 0, y: 0, width: 250, height: 110 },
    },
    bars: {
      hp: bar(PLAYER_BARS, HP_SHADES, 300),
      mp: bar(PLAYER_BARS, MP_SHADES, 300),
      fp: bar(PLAYER_BARS, FP_SHADES, 300),
      targetHp: bar({ x: 300, y: 30, width: 250, height: 30 }, HP_SHADES, 260),
      targetMp: bar({ x: 300, y: 50, width: 250, height: 10 }, MP_SHADES, 260),
    },
    targetMarker: {
      colors: [
        { name: 'blue', color: [131, 148, 205], tolerance: 5 },
        { name: 'red', color: [246, 90, 106], tolerance: 5 },
      ],
      minPixels: 20,
    },
    trayReopenAfter: 5,
  },
  farming: {
    attackSlots: [0],
    aoeAttackSlots: [],
    healSlots: [1],
    aoeHealSlots: [],
    mpRestoreSlots: [2],
    fpRestoreSlots: [3],
    buffSlots: [],
    partySkillSlots: [],
    pickupSlots: [4],
    pickupPetSlot: null,
    pickupMotionSlot: null,
    slotCooldowns: new Array<number>(SLOT_COUNT).fill(0),
    healThreshold: 50,
    mpThreshold: 30,
    fpThreshold: 30,
    minHpAttack: 70,
    prioritizeAggro: true,
    aggroGraceMs: 5000,
    maxEngageDistance: 325,
    maxRotations: 30,
    circleMoveDurationMs: 100,
    obstacleAvoidanceMaxTry: 3,
    obstacleAvoidanceCooldownMs: 5000,
    maxAoeFarming: 1,
    aoeDistance: 75,
    aoeTargetHp: 90,
    mobsTimeoutMs: 0,
    manualTargetOnly: false,
    verifyDelayMs: 150,
    buffCastMs: 1500,
    avoidance: { clickZoneMs: 5000, markerZoneMs: 2000, markerZoneSize: 40, growStep: 10, sameSpotRadius: 60 },
  },
};

type Json = Record<string, unknown>;

function isObject(v: unknown): v is Json {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function section(src: Json, key: string): Json {
  const v = src[key];
  return isObject(v) ? v : {};
}

// Невалидные значения молча заменяются прежними, числа зажимаются в диапазон.
function num(src: Json, key: string, fallback: number, min = -Infinity, max = Infinity): number {
  const v = src[key];
  if (typeof v !== 'number' || !Number.isFinite(v)) return fallback;
  return Math.min(max, Math.max(min, v));
}

function int(src: Json, key: string, fallback: number, min = -Infinity, max = Infinity): number {
  return Math.round(num(src, key, fallback, min, max));
}

function bool(src: Json, key: string, fallback: boolean): boolean {
  const v = src[key];
  return typeof v === 'boolean' ? v : fallback;
}

function rgb(src: Json, key: string, fallback: Rgb): Rgb {
  const v = src[key];
  return isRgb(v) ? [v[0], v[1], v[2]] : [fallback[0], fallback[1], fallback[2]];
}

function rgbList(src: Json, key: string, fallback: readonly Rgb[]): Rgb[] {
  const v = src[key];
  const parsed = Array.isArray(v) ? v.filter(isRgb) : [];
  const list: readonly Rgb[] = parsed.length > 0 ? parsed : fallback;
  return list.map((c): Rgb => [c[0], c[1], c[2]]);
}

function readBounds(v: unknown, fallback: Bounds): Bounds {
  if (!isObject(v)) return { ...fallback };
  return {
    x: int(v, 'x', fallback.x),
    y: int(v, 'y', fallback.y),
    width: int(v, 'width', fallback.width),
    height: int(v, 'height', fallback.height),
  };
}

function boundsOrNull(src: Json, key: string, fallback: Bounds | null): Bounds | null {
  if (!(key in src)) return fallback ? { ...fallback } : null;
  const v = src[key];
  if (v === null) return null;
  return readBounds(v, fallback ?? { x: 0, y: 0, width: 0, height: 0 });
}

function isSlot(v: unknown): v is number {
  return typeof v === 'number' && Number.isInteger(v) && v >= 0 && v < SLOT_COUNT;
}

function slots(src: Json, key: string, fallback: readonly number[]): number[] {
  const v = src[key];
  if (!Array.isArray(v)) return [...fallback];
  const out = v.filter(isSlot);
  if (out.length !== v.length) Logger.warn(`${key}: слоты вне 0..${SLOT_COUNT - 1} отброшены`);
  return out;
}

function slotOrNull(src: Json, key: string, fallback: number | null): number | null {
  if (!(key in src)) return fallback;
  const v = src[key];
  // -1: старое обозначение «выключено»
  if (v === null || v === -1) return null;
  return isSlot(v) ? v : fallback;
}

/** Кулдауны принимаются массивом или объектом {"4": 3000}. */
function cooldowns(src: Json, key: string, fallback: readonly number[]): number[] {
  const v = src[key];
  const out = [...fallback];
  if (Array.isArray(v)) {
    v.slice(0, SLOT_COUNT).forEach((ms, i) => {
      if (typeof ms === 'number' && Number.isFinite(ms)) out[i] = Math.max(0, ms);
    });
  } else if (isObject(v)) {
    for (const [k, ms] of Object.entries(v)) {
      const slot = Number(k);
      if (isSlot(slot) && typeof ms === 'number' && Number.isFinite(ms)) out[slot] = Math.max(0, ms);
    }
  }
  return out;
}

function colorSpec(src: Json, key: string, fallback: ColorSpec): ColorSpec {
  const s = section(src, key);
  return { color: rgb(s, 'color', fallback.color), tolerance: int(s, 'tolerance', fallback.tolerance, 0, 255) };
}

function mergeBar(src: Json, base: StatusBarSettings): StatusBarSettings {
  return {
    region: readBounds(src.region, base.region),
    colors: rgbList(src, 'colors', base.colors),
    tolerance: int(src, 'tolerance', base.tolerance, 0, 255),
    clusterDistanceX: int(src, 'clusterDistanceX', base.clusterDistanceX, 0),
    clusterDistanceY: int(src, 'clusterDistanceY', base.clusterDistanceY, 0),
    minWidth: int(src, 'minWidth', base.minWidth, 0),
    maxWidth: int(src, 'maxWidth', base.maxWidth, 0),
    minHeight: int(src, 'minHeight', base.minHeight, 0),
    maxHeight: int(src, 'maxHeight', base.maxHeight, 0),
  };
}

function mergeMobs(src: Json, base: MobDetectionSettings): MobDetectionSettings {
  const colorsSrc = section(src, 'colors');
  const colors = { ...base.colors };
  for (const t of MOB_TYPES) colors[t] = colorSpec(colorsSrc, t, base.colors[t]);
  return {
    colors,
    clusterDistanceX: int(src, 'clusterDistanceX', base.clusterDistanceX, 0),
    clusterDistanceY: int(src, 'clusterDistanceY', base.clusterDistanceY, 0),
    minNameWidth: int(src, 'minNameWidth', base.minNameWidth, 0),
    maxNameWidth: int(src, 'maxNameWidth', base.maxNameWidth, 0),
    marginTop: int(src, 'marginTop', base.marginTop, 0),
    marginBottom: int(src, 'marginBottom', base.marginBottom, 0),
    minLabelY: int(src, 'minLabelY', base.minLabelY, 0),
    exclude: boundsOrNull(src, 'exclude', base.exclude),
  };
}

function mergeMarker(src: Json, base: TargetMarkerSettings): TargetMarkerSettings {
  let colors = base.colors.map((c): MarkerColor => ({ ...c, color: [c.color[0], c.color[1], c.color[2]] }));
  const raw = src.colors;
  if (Array.isArray(raw)) {
    const parsed: MarkerColor[] = [];
    raw.forEach((c, i) => {
      if (isObject(c) && isRgb(c.color)) {
        parsed.push({
          name: typeof c.name === 'string' ? c.name : `marker${i}`,
          color: [c.color[0], c.color[1], c.color[2]],
          tolerance: int(c, 'tolerance', 5, 0, 255),
        });
      }
    });
    if (parsed.length > 0) colors = parsed;
  }
  return { colors, minPixels: int(src, 'minPixels', base.minPixels, 0) };
}

function mergeFarming(src: Json, base: FarmingSettings): FarmingSettings {
  const av = section(src, 'avoidance');
  return {
    attackSlots: slots(src, 'attackSlots', base.attackSlots),
    aoeAttackSlots: slots(src, 'aoeAttackSlots', base.aoeAttackSlots),
    healSlots: slots(src, 'healSlots', base.healSlots),
    aoeHealSlots: slots(src, 'aoeHealSlots', base.aoeHealSlots),
    mpRestoreSlots: slots(src, 'mpRestoreSlots', base.mpRestoreSlots),
    fpRestoreSlots: slots(src, 'fpRestoreSlots', base.fpRestoreSlots),
    buffSlots: slots(src, 'buffSlots', base.buffSlots),
    partySkillSlots: slots(src, 'partySkillSlots', base.partySkillSlots),
    pickupSlots: slots(src, 'pickupSlots', base.pickupSlots),
    pickupPetSlot: slotOrNull(src, 'pickupPetSlot', base.pickupPetSlot),
    pickupMotionSlot: slotOrNull(src, 'pickupMotionSlot', base.pickupMotionSlot),
    slotCooldowns: cooldowns(src, 'slotCooldowns', base.slotCooldowns),
    healThreshold: int(src, 'healThreshold', base.healThreshold, 0, 100),
    mpThreshold: int(src, 'mpThreshold', base.mpThreshold, 0, 100),
    fpThreshold: int(src, 'fpThreshold', base.fpThreshold, 0, 100),
    minHpAttack: int(src, 'minHpAttack', base.minHpAttack, 0, 100),
    prioritizeAggro: bool(src, 'prioritizeAggro', base.prioritizeAggro),
    aggroGraceMs: int(src, 'aggroGraceMs', base.aggroGraceMs, 0),
    maxEngageDistance: num(src, 'maxEngageDistance', base.maxEngageDistance, 0),
    maxRotations: int(src, 'maxRotations', base.maxRotations, 0),
    circleMoveDurationMs: int(src, 'circleMoveDurationMs', base.circleMoveDurationMs, 0),
    obstacleAvoidanceMaxTry: int(src, 'obstacleAvoidanceMaxTry', base.obstacleAvoidanceMaxTry, 0),
    obstacleAvoidanceCooldownMs: int(src, 'obstacleAvoidanceCooldownMs', base.obstacleAvoidanceCooldownMs, 0),
    maxAoeFarming: int(src, 'maxAoeFarming', base.maxAoeFarming, 1),
    aoeDistance: num(src, 'aoeDistance', base.aoeDistance, 0),
    aoeTargetHp: int(src, 'aoeTargetHp', base.aoeTargetHp, 0, 100),
    mobsTimeoutMs: int(src, 'mobsTimeoutMs', base.mobsTimeoutMs, 0),
    manualTargetOnly: bool(src, 'manualTargetOnly', base.manualTargetOnly),
    verifyDelayMs: int(src, 'verifyDelayMs', base.verifyDelayMs, 0),
    buffCastMs: int(src, 'buffCastMs', base.buffCastMs, 0),
    avoidance: {
      clickZoneMs: int(av, 'clickZoneMs', base.avoidance.clickZoneMs, 0),
      markerZoneMs: int(av, 'markerZoneMs', base.avoidance.markerZoneMs, 0),
      markerZoneSize: int(av, 'markerZoneSize', base.avoidance.markerZoneSize, 0),
      growStep: int(av, 'growStep', base.avoidance.growStep, 0),
      sameSpotRadius: num(av, 'sameSpotRadius', base.avoidance.sameSpotRadius, 0),
    },
  };
}

/**
 * Накладывает частичный (возможно, невалидный) объект настроек поверх base.
 * Каждое поле проверяется отдельно: неверное значение оставляет прежнее.
 */
export function mergeSettings(base: BotSettings, patch: unknown): BotSettings {
  const src = isObject(patch) ? patch : {};
  const capture = section(src, 'capture');
  const actions = section(src, 'actions');
  const server = section(src, 'server');
  const detection = section(src, 'detection');
  const barsSrc = section(detection, 'bars');
  const bars = { ...base.detection.bars };
  for (const k of STATUS_BAR_KINDS) bars[k] = mergeBar(section(barsSrc, k), base.detection.bars[k]);

  return {
    logLevel: isLogLevel(src.logLevel) ? src.logLevel : base.logLevel,
    capture: {
      intervalMs: int(capture, 'intervalMs', base.capture.intervalMs, 10),
      timeoutMs: int(capture, 'timeoutMs', base.capture.timeoutMs, 100),
      roi: boundsOrNull(capture, 'roi', base.capture.roi),
    },
    actions: {
      enableActions: bool(actions, 'enableActions', base.actions.enableActions),
      clickDelayMs: int(actions, 'clickDelayMs', base.actions.clickDelayMs, 0),
    },
    server: {
      enabled: bool(server, 'enabled', base.server.enabled),
      port: int(server, 'port', base.server.port, 0, 65535),
    },
    detection: {
      mobs: mergeMobs(section(detection, 'mobs'), base.detection.mobs),
      bars,
      targetMarker: mergeMarker(section(detection, 'targetMarker'), base.detection.targetMarker),
      trayReopenAfter: int(detection, 'trayReopenAfter', base.detection.trayReopenAfter, 1),
    },
    farming: mergeFarming(section(src, 'farming'), base.farming),
  };
}

/** Простая функция удаления комментариев из JSONC (// ... и /* ... *\/), строки не трогаются. */
export function stripJsonComments(input: string): string {
  let out = '';
  let inString = false;
  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (inString) {
      out += ch;
      if (ch === '\\') { out += input[i + 1] ?? ''; i++; }
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') { inString = true; out += ch; continue; }
    if (ch === '/' && input[i + 1] === '/') {
      while (i < input.length && input[i] !== '\n') i++;
      out += '\n';
      continue;
    }
    if (ch === '/' && input[i + 1] === '*') {
      const end = input.indexOf('*/', i + 2);
      i = end < 0 ? input.length : end + 1;
      continue;
    }
    out += ch;
  }
  return out;
}

export function parseSettings(text: string): BotSettings {
  return mergeSettings(DEFAULT_SETTINGS, JSON.parse(stripJsonComments(text)));
}

/**
 * Загружает настройки из settings.jsonc. При ошибке чтения/парсинга возвращаем дефолты, чтобы не падать на старте.
 * @param file Путь к файлу; по умолчанию settings.jsonc в рабочей директории
 */
export function loadSettings(file = path.resolve(process.cwd(), 'settings.jsonc')): BotSettings {
  if (!fs.existsSync(file)) {
    Logger.info(`${file} не найден, используются настройки по умолчанию`);
    return DEFAULT_SETTINGS;
  }
  try {
    return parseSettings(fs.readFileSync(file, 'utf-8'));
  } catch (e) {
    Logger.warn(`не удалось прочитать ${file}: ${errorMessage(e)}; используются настройки по умолчанию`);
    return DEFAULT_SETTINGS;
  }
}
