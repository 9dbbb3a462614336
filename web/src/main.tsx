import React from 'react';
import ReactDOM from 'react-dom/client';

import { App } from './ui/App.js';

window.addEventListener('unhandledrejection', (e) => {
  console.error(`[web] unhandledrejection: ${String(e.reason)}`);
});

const rootElement = document.getElementById('root');
if (!rootElement) throw new Error('root element #root is missing');

ReactDOM.createRoot(rootElement).render(
  <React.StrictMode>
    <App />
  </React.StrictMode>,
);
