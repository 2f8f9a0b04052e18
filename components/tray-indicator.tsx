'use client';

import { useState } from 'react';
import type { TrayIntent, TrayView } from '@/lib/tray';

type TrayIndicatorProps = {
  view: TrayView | null;
  onIntent: (intent: TrayIntent) => void;
};

export default function TrayIndicator({ view, onIntent }: TrayIndicatorProps) {
  const [open, setOpen] = useState(false);
  const glyph = view?.glyph ?? 'neutral';

  return (
    <div className="tray">
      <button
        type="button"
        className={`tray-glyph tray-${glyph}`}
        title={view?.tooltip ?? 'pingwatch'}
        aria-haspopup="menu"
        aria-expanded={open}
        onClick={() => setOpen((prev) => !prev)}
      >
        <span className="sr-only">{view?.tooltip ?? 'pingwatch'}</span>
      </button>
      {open && view && (
        <ul className="tray-menu" role="menu">
          {view.menu.map((item) => (
            <li key={item.intent} role="none">
              <button
                type="button"
                role="menuitem"
                onClick={() => {
                  setOpen(false);
                  onIntent(item.intent);
                }}
              >
                {item.label}
              </button>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
