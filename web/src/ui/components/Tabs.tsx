import React from 'react';

import { Button } from './Button.js';

export function Tabs<T extends string>(props: {
  tabs: { id: T; label: string }[];
  active: T;
  onChange: (id: T) => void;
}) {
  return (
    <div role="tablist" style={{ display: 'flex', gap: 8, flexWrap: 'wrap' }}>
      {props.tabs.map((t) => (
        <Button
          key={t.id}
          role="tab"
          aria-selected={props.active === t.id}
          variant={props.active === t.id ? 'primary' : 'ghost'}
          onClick={() => props.onChange(t.id)}
        >
          {t.label}
        </Button>
      ))}
    </div>
  );
}
