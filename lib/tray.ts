import type { Subscription } from 'rxjs';
import type { NetworkMonitor } from './monitor';
import type { HealthState } from './types';

export type TrayGlyph = 'neutral' | 'green' | 'red';

export type TrayIntent = 'show-window' | 'hide-window' | 'toggle-window' | 'reset' | 'reset-all' | 'quit';

export const TRAY_INTENTS: readonly TrayIntent[] = [
  'show-window',
  'hide-window',
  'toggle-window',
  'reset',
  'reset-all',
  'quit'
];

export type TrayMenuItem = {
  intent: TrayIntent;
  label: string;
};

export type TrayView = {
  glyph: TrayGlyph;
  tooltip: string;
  windowVisible: boolean;
  menu: TrayMenuItem[];
};

export type TrayActions = {
  resetStats: (target?: string) => void;
  quit: () => void;
};

const GLYPHS: Record<HealthState, TrayGlyph> = {
  unknown: 'neutral',
  green: 'green',
  red: 'red'
};

export function isTrayIntent(value: unknown): value is TrayIntent {
  return typeof value === 'string' && TRAY_INTENTS.some((intent) => intent === value);
}

export class TrayIndicator {
  private glyphState: TrayGlyph;
  private windowVisible = true;
  private subscription: Subscription | undefined;

  constructor(
    private readonly title: string,
    private readonly actions: TrayActions,
    initial: HealthState = 'unknown'
  ) {
    this.glyphState = GLYPHS[initial];
  }

  attach(monitor: NetworkMonitor): void {
    this.detach();
    this.glyphState = GLYPHS[monitor.currentHealth()];
    this.subscription = monitor.onHealthChanged((change) => {
      this.glyphState = GLYPHS[change.current];
    });
  }

  detach(): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
  }

  view(): TrayView {
    return {
      glyph: this.glyphState,
      tooltip: `${this.title} (${this.glyphState === 'neutral' ? 'waiting for data' : this.glyphState})`,
      windowVisible: this.windowVisible,
      menu: [
        { intent: 'toggle-window', label: this.windowVisible ? 'Hide window' : 'Show window' },
        { intent: 'reset-all', label: 'Reset all statistics' },
        { intent: 'quit', label: 'Quit' }
      ]
    };
  }

  handle(intent: TrayIntent, target?: string): void {
    switch (intent) {
      case 'show-window':
        this.windowVisible = true;
        break;
      case 'hide-window':
        this.windowVisible = false;
        break;
      case 'toggle-window':
        this.windowVisible = !this.windowVisible;
        break;
      case 'reset':
        this.actions.resetStats(target);
        break;
      case 'reset-all':
        this.actions.resetStats();
        break;
      case 'quit':
        this.detach();
        this.actions.quit();
        break;
    }
  }
}
