import { describe, it, expect } from 'vitest';
import { generateBanner, type BannerOptions } from '../index';

const stripAnsi = (text: string): string => text.replace(new RegExp(`${'\x1b'}\\[[0-9;]*m`, 'g'), '');

describe('generateBanner', () => {
  const baseOptions: BannerOptions = {
    title: 'SERAPH Relay',
    port: 5000,
    provider: 'Google Gemini',
    model: 'gemini-2.0-flash',
    throttleMs: 1000,
    cacheTtlMs: 300000,
    database: false,
  };

  it('should start and end with empty lines', () => {
    const banner = generateBanner(baseOptions);
    expect(banner[0]).toBe('');
    expect(banner[banner.length - 1]).toBe('');
  });

  it('should have top and bottom borders', () => {
    const banner = generateBanner(baseOptions);
    expect(stripAnsi(banner[1])).toBe(`╔${'═'.repeat(53)}╗`);
    expect(stripAnsi(banner[banner.length - 2])).toBe(`╚${'═'.repeat(53)}╝`);
  });

  it('should place the divider right after the title', () => {
    const banner = generateBanner(baseOptions);
    expect(stripAnsi(banner[2]).trim()).toBe(`║  ${'SERAPH Relay'.padEnd(49)}  ║`);
    expect(stripAnsi(banner[3])).toBe(`╠${'═'.repeat(53)}╣`);
  });

  it('should pad every boxed line to the same visible width', () => {
    const banner = generateBanner(baseOptions);
    for (const line of banner.slice(1, -1)) {
      expect([...stripAnsi(line)].length).toBe(55);
    }
  });

  it('should show port, provider, model, throttle and cache settings', () => {
    const lines = generateBanner(baseOptions).map((line) => stripAnsi(line).slice(3, -3).trimEnd());
    expect(lines).toContain('Port:       5000');
    expect(lines).toContain('Provider:   Google Gemini');
    expect(lines).toContain('Model:      gemini-2.0-flash');
    expect(lines).toContain('Throttle:   1000 ms between calls');
    expect(lines).toContain('Cache TTL:  300 s');
    expect(lines).toContain('Database:   not configured');
  });

  it('should report a configured database', () => {
    const lines = generateBanner({ ...baseOptions, database: true }).map((line) =>
      stripAnsi(line).slice(3, -3).trimEnd()
    );
    expect(lines).toContain('Database:   configured');
  });
});
