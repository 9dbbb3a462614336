import React from 'react';

export function Input(props: React.InputHTMLAttributes<HTMLInputElement> & { label?: string }) {
  const { label, style, ...rest } = props;
  const input = (
    <input
      {...rest}
      style={{
        padding: '8px 10px',
        borderRadius: 10,
        border: '1px solid #d1d5db',
        outline: 'none',
        ...(style ?? {}),
      }}
    />
  );
  if (!label) return input;
  return (
    <label style={{ display: 'flex', flexDirection: 'column', gap: 4, fontSize: 13, color: '#374151' }}>
      <span style={{ fontWeight: 600 }}>{label}</span>
      {input}
    </label>
  );
}
