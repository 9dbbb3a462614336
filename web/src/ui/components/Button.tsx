import React from 'react';

type ButtonProps = React.ButtonHTMLAttributes<HTMLButtonElement> & {
  variant?: 'primary' | 'ghost';
  busy?: boolean;
};

export function Button(props: ButtonProps) {
  const { variant = 'primary', busy = false, disabled, style, children, ...rest } = props;
  const off = disabled || busy;
  const base: React.CSSProperties = {
    borderRadius: 10,
    padding: '8px 12px',
    border: '1px solid transparent',
    fontWeight: 700,
    cursor: off ? 'not-allowed' : 'pointer',
    background: variant === 'primary' ? '#111827' : 'transparent',
    color: variant === 'primary' ? '#fff' : '#111827',
    opacity: off ? 0.6 : 1,
  };
  const ghost: React.CSSProperties =
    variant === 'ghost'
      ? { border: '1px solid #e5e7eb', background: '#fff', color: '#111827' }
      : {};

  return (
    <button {...rest} disabled={off} aria-busy={busy} style={{ ...base, ...ghost, ...(style ?? {}) }}>
      {busy ? 'Memproses…' : children}
    </button>
  );
}
