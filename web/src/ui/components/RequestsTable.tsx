import React from 'react';
import { STAGE_DEFINITIONS, StageStatus, type RequestSummaryRow } from '@procmon/shared';

const cell: React.CSSProperties = { padding: '6px 8px', borderBottom: '1px solid #f3f4f6', whiteSpace: 'nowrap', fontSize: 13 };
const head: React.CSSProperties = { ...cell, textAlign: 'left', background: '#f9fafb', fontWeight: 700 };

function statusColor(status: StageStatus): string {
  if (status === StageStatus.Done) return '#15803d';
  if (status === StageStatus.InProcess) return '#b45309';
  return '#6b7280';
}

export function RequestsTable(props: { rows: RequestSummaryRow[]; selectedId: string | null; onSelect: (requestId: string) => void }) {
  return (
    <div style={{ overflowX: 'auto', border: '1px solid #e5e7eb', borderRadius: 12 }}>
      <table style={{ width: '100%', borderCollapse: 'collapse' }}>
        <thead>
          <tr>
            <th style={head}>REQUEST_ID</th>
            <th style={head}>Tanggal Upload</th>
            <th style={head}>No SPBJ Kapal</th>
            <th style={head}>Judul</th>
            {STAGE_DEFINITIONS.map((d) => (
              <th key={d.key} style={head}>
                {d.label}
              </th>
            ))}
            <th style={head}>Progres</th>
            <th style={head}>Last Update</th>
          </tr>
        </thead>
        <tbody>
          {props.rows.map((row) => (
            <tr
              key={row.requestId}
              onClick={() => props.onSelect(row.requestId)}
              style={{ cursor: 'pointer', background: row.requestId === props.selectedId ? '#eef2ff' : undefined }}
            >
              <td style={cell}>{row.requestId}</td>
              <td style={cell}>{row.uploadDate}</td>
              <td style={cell}>{row.shipReference}</td>
              <td style={{ ...cell, whiteSpace: 'normal', minWidth: 200 }}>{row.title}</td>
              {STAGE_DEFINITIONS.map((d) => {
                const c = row.stages[d.key];
                return (
                  <td key={d.key} style={cell}>
                    <div style={{ color: statusColor(c.status), fontWeight: 600 }}>{c.status}</div>
                    {c.date ? <div style={{ color: '#6b7280', fontSize: 12 }}>{c.date}</div> : null}
                  </td>
                );
              })}
              <td style={cell}>
                {row.doneCount}/{row.stageCount}
              </td>
              <td style={cell}>{row.lastUpdate}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
