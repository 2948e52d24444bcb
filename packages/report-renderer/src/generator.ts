/**
 * Report Generator
 * Creates the HTML integrity report of a case from its ledger
 */

import { PRODUCT_NAME, formatLogTimestamp } from '@custodian/core';
import type { CaseInfo, EvidenceRecord } from '@custodian/core';
import { summarizeEvidence } from '@custodian/case-session';
import type { CategoryCount, EvidenceSummary, IntegrityReport } from '@custodian/case-session';
import { REPORT_STYLES } from './styles.js';

export interface ReportInput {
  caseInfo: CaseInfo;
  /** Ledger records in evidence order */
  records: readonly EvidenceRecord[];
  generatedAt: Date;
  /** Case base directory, shown in the footer */
  caseRoot: string;
  reportFilename: string;
  /** Result of re-hashing the stored copies, when it was run */
  integrity?: IntegrityReport;
}

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * "March 5, 2024 at 02:07 PM"
 */
export function formatReportDate(date: Date): string {
  const hours = date.getHours() % 12 || 12;
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const meridiem = date.getHours() < 12 ? 'AM' : 'PM';
  return (
    `${MONTHS[date.getMonth()]} ${date.getDate()}, ${date.getFullYear()} ` +
    `at ${String(hours).padStart(2, '0')}:${minutes} ${meridiem}`
  );
}

function titleCase(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function renderInfoItem(label: string, value: string | undefined): string {
  return `<div class="info-item"><div class="info-label">${escapeHtml(label)}</div><div class="info-value">${escapeHtml(value ?? 'N/A')}</div></div>`;
}

function renderCategoryBreakdown(categories: CategoryCount[]): string {
  if (categories.length === 0) return '';

  const items = categories
    .map(
      c =>
        `<li><strong>${escapeHtml(titleCase(c.category))}:</strong> ${c.count} files (${c.percentage.toFixed(1)}%)</li>`
    )
    .join('\n          ');

  return `
      <h4>File Type Breakdown</h4>
      <ul>
          ${items}
      </ul>`;
}

function renderEvidenceTable(records: readonly EvidenceRecord[]): string {
  if (records.length === 0) {
    return '<p>No evidence files were processed for this case.</p>';
  }

  const rows = records
    .map(
      (record, index) => `
          <tr>
            <td><strong>${index + 1}</strong></td>
            <td>${escapeHtml(record.originalFilename)}</td>
            <td><span class="file-type type-${record.file.category}">${record.file.category}</span></td>
            <td>${record.file.sizeMb.toFixed(2)}</td>
            <td class="hash">${escapeHtml(record.sha256)}</td>
            <td>${formatLogTimestamp(record.processedAt)}</td>
          </tr>`
    )
    .join('');

  return `
      <table class="evidence-table">
        <thead>
          <tr>
            <th>#</th>
            <th>Original Filename</th>
            <th>File Type</th>
            <th>Size (MB)</th>
            <th>SHA-256 Hash</th>
            <th>Processed Time</th>
          </tr>
        </thead>
        <tbody>${rows}
        </tbody>
      </table>`;
}

function renderIntegrityBadge(integrity: IntegrityReport | undefined): string {
  if (!integrity) {
    return '<span class="badge badge-neutral">HASHED</span> All evidence files were hashed with SHA-256 at acquisition. Stored copies were not re-verified for this report.';
  }
  if (integrity.passed) {
    return `<span class="badge badge-ok">INTEGRITY VERIFIED</span> All ${integrity.intact} stored copies match their recorded SHA-256 digests.`;
  }
  return `<span class="badge badge-fail">INTEGRITY CHECK FAILED</span> ${integrity.tampered} tampered, ${integrity.missing} missing of ${integrity.checks.length} stored copies.`;
}

function renderSummaryCards(summary: EvidenceSummary, integrity: IntegrityReport | undefined): string {
  const verified = integrity ? (integrity.passed ? '✓' : '✗') : '–';

  return `
      <div class="stats-grid">
        <div class="stat-card"><div class="stat-number">${summary.totalFiles}</div><div>Evidence Files</div></div>
        <div class="stat-card"><div class="stat-number">${summary.totalSizeMb.toFixed(1)}</div><div>Total Size (MB)</div></div>
        <div class="stat-card"><div class="stat-number">${summary.categories.length}</div><div>File Types</div></div>
        <div class="stat-card"><div class="stat-number">${verified}</div><div>Integrity Verified</div></div>
      </div>`;
}

/**
 * Render the complete, self-contained report document
 */
export function renderReport(input: ReportInput): string {
  const { caseInfo, records, generatedAt, integrity } = input;
  const summary = summarizeEvidence(records);
  const caseNumber = escapeHtml(caseInfo.caseId.number);

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Digital Forensic Report - Case ${caseNumber}</title>
  <style>${REPORT_STYLES}  </style>
</head>
<body>
  <div class="container">
    <header>
      <h1>DIGITAL FORENSIC REPORT</h1>
      <h2>Case #${caseNumber}</h2>
      <p>Generated on ${formatReportDate(generatedAt)}</p>
    </header>

    <div class="section">
      <h3>Case Information</h3>
      <div class="case-info">
        ${renderInfoItem('Case Number', caseInfo.caseId.number)}
        ${renderInfoItem('Investigator', caseInfo.investigator)}
        ${renderInfoItem('Victim', caseInfo.victim)}
        ${renderInfoItem('Suspect', caseInfo.suspect)}
        ${renderInfoItem('Crime Type', caseInfo.crimeType)}
        ${renderInfoItem('Report Generated', formatLogTimestamp(generatedAt))}
      </div>
    </div>

    <div class="section">
      <h3>Evidence Summary</h3>${renderSummaryCards(summary, integrity)}${renderCategoryBreakdown(summary.categories)}
    </div>

    <div class="section">
      <h3>Evidence Inventory</h3>${renderEvidenceTable(records)}
    </div>

    <div class="section">
      <h3>Chain of Custody &amp; Integrity</h3>
      <p>${renderIntegrityBadge(integrity)}</p>
      <ul>
        <li>All files copied to the case evidence directory under time-prefixed names</li>
        <li>SHA-256 digests calculated over the stored copies and written to the hashes directory</li>
        <li>File modification times preserved on the stored copies</li>
        <li>Every operation recorded in the case audit log</li>
      </ul>
    </div>

    <footer>
      <p><strong>${escapeHtml(PRODUCT_NAME)}</strong></p>
      <p>Case Directory: ${escapeHtml(input.caseRoot)}</p>
      <p>Report File: ${escapeHtml(input.reportFilename)}</p>
    </footer>
  </div>
</body>
</html>
`;
}
