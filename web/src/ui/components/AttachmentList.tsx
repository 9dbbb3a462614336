import React from 'react';
import { resolveFileLink, type FileRef } from '@procmon/shared';

export function AttachmentList(props: { files: FileRef[] }) {
  if (props.files.length === 0) {
    return <div style={{ color: '#6b7280', fontSize: 12 }}>(Tidak ada file / belum terbaca)</div>;
  }
  return (
    <ul style={{ margin: 0, paddingLeft: 18 }}>
      {props.files.map((f, idx) => {
        const link = resolveFileLink(f);
        return (
          <li key={`${f.name}-${idx}`}>
            {link.url ? (
              <a href={link.url} target="_blank" rel="noopener noreferrer">
                {f.name}
              </a>
            ) : (
              <span>{f.name}</span>
            )}
          </li>
        );
      })}
    </ul>
  );
}
