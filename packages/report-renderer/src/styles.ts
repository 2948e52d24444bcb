/**
 * Stylesheet embedded in every report
 */

export const REPORT_STYLES = `
    :root {
      --primary: #1e3c72;
      --primary-light: #2a5298;
      --success: #2e7d32;
      --danger: #c62828;
      --gray-50: #f8f9fa;
      --gray-200: #e5e7eb;
      --gray-600: #4b5563;
      --gray-800: #1f2937;
    }

    * { box-sizing: border-box; }

    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      background: #f5f5f5;
      color: var(--gray-800);
      line-height: 1.6;
      margin: 0;
      padding: 20px;
    }

    .container {
      max-width: 1200px;
      margin: 0 auto;
      background: white;
      padding: 30px;
      border-radius: 10px;
      box-shadow: 0 0 20px rgba(0,0,0,0.1);
    }

    header {
      background: linear-gradient(135deg, var(--primary), var(--primary-light));
      color: white;
      padding: 30px;
      border-radius: 10px;
      margin: -30px -30px 30px -30px;
      text-align: center;
    }

    header h1 { margin: 0; font-size: 2.25rem; }
    header h2 { margin: 10px 0 0 0; font-size: 1.5rem; opacity: 0.9; }

    .section {
      margin: 30px 0;
      padding: 20px;
      border-left: 4px solid var(--primary-light);
      background: var(--gray-50);
    }

    .section h3 {
      color: var(--primary);
      margin-top: 0;
      border-bottom: 2px solid var(--primary-light);
      padding-bottom: 10px;
    }

    .case-info {
      display: grid;
      grid-template-columns: 1fr 1fr;
      gap: 20px;
    }

    .info-item {
      background: white;
      padding: 15px;
      border-radius: 8px;
      border: 1px solid #ddd;
    }

    .info-label {
      font-weight: bold;
      color: var(--primary);
      text-transform: uppercase;
      font-size: 0.9em;
    }

    .stats-grid {
      display: grid;
      grid-template-columns: repeat(auto-fit, minmax(200px, 1fr));
      gap: 20px;
    }

    .stat-card {
      background: linear-gradient(135deg, #667eea, #764ba2);
      color: white;
      padding: 20px;
      border-radius: 10px;
      text-align: center;
    }

    .stat-number { font-size: 2.5em; font-weight: bold; }

    .evidence-table {
      width: 100%;
      border-collapse: collapse;
      background: white;
    }

    .evidence-table th {
      background: var(--primary);
      color: white;
      padding: 12px 15px;
      text-align: left;
    }

    .evidence-table td {
      padding: 12px 15px;
      border-bottom: 1px solid #eee;
    }

    .file-type {
      display: inline-block;
      padding: 4px 12px;
      border-radius: 20px;
      font-size: 0.85em;
      font-weight: bold;
      text-transform: uppercase;
    }

    .type-image { background: #e8f5e8; color: #2e7d32; }
    .type-video { background: #fff3e0; color: #f57c00; }
    .type-document { background: #e3f2fd; color: #1976d2; }
    .type-archive { background: #fce4ec; color: #c2185b; }
    .type-unknown { background: #f5f5f5; color: #757575; }

    .hash {
      font-family: 'Courier New', monospace;
      font-size: 0.9em;
      color: var(--gray-600);
      word-break: break-all;
    }

    .badge {
      display: inline-block;
      padding: 6px 12px;
      color: white;
      border-radius: 20px;
      font-size: 0.8em;
      font-weight: bold;
    }

    .badge-ok { background: var(--success); }
    .badge-fail { background: var(--danger); }
    .badge-neutral { background: var(--gray-600); }

    footer {
      margin-top: 40px;
      padding: 20px;
      background: var(--gray-50);
      border-radius: 8px;
      text-align: center;
      color: var(--gray-600);
      font-size: 0.9em;
    }
`;
