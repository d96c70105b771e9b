import { access, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { DigitalOutput } from './types.js';

/** GPIO through the kernel's sysfs interface (/sys/class/gpio). */
export class SysfsGpio implements DigitalOutput {
  constructor(private readonly root = '/sys/class/gpio') {}

  async setup(channel: number): Promise<void> {
    const pin = this.pinDir(channel);
    try {
      await access(pin);
    } catch {
      await writeFile(join(this.root, 'export'), String(channel));
    }
    await writeFile(join(pin, 'direction'), 'out');
    await writeFile(join(pin, 'value'), '0');
  }

  async write(channel: number, high: boolean): Promise<void> {
    await writeFile(join(this.pinDir(channel), 'value'), high ? '1' : '0');
  }

  private pinDir(channel: number): string {
    return join(this.root, `gpio${channel}`);
  }
}
