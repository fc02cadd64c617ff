import { spawn } from 'child_process';
import type { ActionsSettings } from './Config';
import type { Point } from './Geometry';
import { createLogger, errorMessage } from './Logger';

const Logger = createLogger('Actions');

/**
 * Исполнитель ввода. Вызовы не бросают исключений: ошибки логируются,
 * а тик продолжается «вслепую».
 */
export interface Actuator {
  click(p: Point): Promise<void>;
  pressKey(key: string): Promise<void>;
  holdKey(key: string): Promise<void>;
  releaseKey(key: string): Promise<void>;
  /** Слот n панели быстрого доступа: клавиша с цифрой n. */
  useSlot(slot: number): Promise<void>;
}

// Virtual-key коды Win32 для клавиш, которыми пользуется бот.
const VK: Record<string, number> = {
  space: 0x20,
  escape: 0x1b,
  left: 0x25,
  right: 0x27,
  up: 0x26,
  down: 0x28,
};
for (let d = 0; d <= 9; d++) VK[String(d)] = 0x30 + d;
for (let c = 0; c < 26; c++) VK[String.fromCharCode(0x61 + c)] = 0x41 + c;

export function virtualKey(key: string): number | null {
  return VK[key.toLowerCase()] ?? null;
}

function runPwsh(cmd: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const ps = spawn('powershell.exe', ['-NoProfile', '-ExecutionPolicy', 'Bypass', '-Command', cmd], {
      windowsHide: true,
    });
    ps.on('error', reject);
    ps.stderr.on('data', (d: Buffer) => Logger.debug(`[pwsh stderr] ${d.toString()}`));
    ps.on('close', (code) => {
      if (code === 0) resolve();
      else reject(new Error(`PowerShell exited with code ${code}`));
    });
  });
}

// PowerShell helpers using user32.dll
const psSetCursorPos = (x: number, y: number) => `
Add-Type @"
using System;
using System.Runtime.InteropServices;
public class User32 {
  [DllImport("user32.dll")] public static extern bool SetCursorPos(int X, int Y);
}
"@;
[void][User32]::SetCursorPos(${Math.round(x)}, ${Math.round(y)});
`;

const psMouseClick = `
Add-Type -TypeDefinition @"
using System;using System.Runtime.InteropServices;public static class Mouse{
  [DllImport("user32.dll")] static extern void mouse_event(uint dwFlags, uint dx, uint dy, uint dwData, UIntPtr dwExtraInfo);
  const uint MOUSEEVENTF_LEFTDOWN=0x02; const uint MOUSEEVENTF_LEFTUP=0x04;
  public static void LeftClick(){ mouse_event(MOUSEEVENTF_LEFTDOWN,0,0,0,UIntPtr.Zero); mouse_event(MOUSEEVENTF_LEFTUP,0,0,0,UIntPtr.Zero);} }
"@;
[Mouse]::LeftClick();
`;

const psKey = (vk: number, up: boolean) => `
Add-Type -TypeDefinition @"
using System;using System.Runtime.InteropServices;public static class Kbd{
  [DllImport("user32.dll")] public static extern void keybd_event(byte bVk, byte bScan, uint dwFlags, UIntPtr dwExtraInfo);
}
"@;
[Kbd]::keybd_event(${vk}, 0, ${up ? 2 : 0}, [UIntPtr]::Zero);
`;

/**
 * Реальный ввод через PowerShell + user32.dll. При enableActions=false только логирует (dry-run).
 * origin: левый верхний угол кадра на экране, если захват кадрирован по ROI.
 */
export class Actions implements Actuator {
  constructor(private readonly cfg: ActionsSettings, private readonly origin: Point = { x: 0, y: 0 }) {}

  private async run(label: string, script: string): Promise<void> {
    if (!this.cfg.enableActions) { Logger.info(`[dry-run] ${label}`); return; }
    try {
      await runPwsh(script);
    } catch (e) {
      Logger.error(`${label}: ${errorMessage(e)}`);
    }
  }

  private async key(key: string, up: boolean): Promise<void> {
    const vk = virtualKey(key);
    if (vk === null) { Logger.warn(`неизвестная клавиша "${key}"`); return; }
    await this.run(`${up ? 'KEYUP' : 'KEYDOWN'} ${key}`, psKey(vk, up));
  }

  async click(p: Point): Promise<void> {
    const x = p.x + this.origin.x;
    const y = p.y + this.origin.y;
    await this.run(`CLICK (${x},${y})`, psSetCursorPos(x, y) + psMouseClick);
    if (this.cfg.enableActions && this.cfg.clickDelayMs > 0) {
      await new Promise((r) => setTimeout(r, this.cfg.clickDelayMs));
    }
  }

  async pressKey(key: string): Promise<void> {
    await this.key(key, false);
    await this.key(key, true);
  }

  holdKey(key: string): Promise<void> {
    return this.key(key, false);
  }

  releaseKey(key: string): Promise<void> {
    return this.key(key, true);
  }

  useSlot(slot: number): Promise<void> {
    return this.pressKey(String(slot));
  }
}
