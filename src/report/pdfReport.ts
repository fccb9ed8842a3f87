/**
 * PDF rendering of a finalized ProcessReport.
 */
import { writeFile } from 'node:fs/promises';
import PDFDocument from 'pdfkit';
import { RISK_LEVELS, type ProcessReport } from '../types/index.js';
import { invalidCpfAlert, summarizeRecords } from './textReport.js';

export function renderReportPdf(report: ProcessReport, outputPath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: 'A4',
      margins: { top: 72, bottom: 72, left: 72, right: 72 },
      info: { Title: `PII Scan Report ${report.processId}`, Creator: 'piiscan' },
    });

    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => {
      writeFile(outputPath, Buffer.concat(chunks)).then(resolve, reject);
    });
    doc.on('error', reject);

    doc.fontSize(22).font('Helvetica-Bold').text('PII Scan Report', { align: 'center' });
    doc.fontSize(10).font('Helvetica').text(report.processId, { align: 'center' });
    doc.moveDown(1.5);

    heading(doc, `Risk level: ${report.riskLevel}${report.incomplete ? ' (incomplete batch)' : ''}`);
    paragraph(doc, report.riskDescription);

    heading(doc, 'Processing');
    paragraph(doc, `Records analysed: ${report.totalRecords}`);
    paragraph(doc, `Records with PII: ${report.recordsWithPii} (${report.piiRatePercentage.toFixed(2)}%)`);
    paragraph(doc, `Records without PII: ${report.recordsWithoutPii}`);
    paragraph(doc, `Partially processed: ${report.partialRecords}`);
    paragraph(doc, `Processing time: ${report.processingTimeSeconds.toFixed(2)}s (${report.recordsPerSecond} records/s)`);

    heading(doc, 'Detections by type');
    if (report.piiBreakdown.length === 0) paragraph(doc, 'No PII detected.');
    for (const entry of report.piiBreakdown) {
      bullet(doc, `${entry.type}: ${entry.count} (${entry.percentage.toFixed(2)}%) ${entry.description}`);
    }

    if (report.piiBreakdown.length > 0) {
      heading(doc, 'Records by type');
      for (const entry of report.piiBreakdown) {
        bullet(doc, `${entry.type}: ${summarizeRecords(report.recordsByType[entry.type] ?? [])}`);
      }
    }

    heading(doc, 'Records by risk');
    for (const level of [...RISK_LEVELS].reverse()) {
      bullet(doc, `${level}: ${report.recordsByRisk[level]}`);
    }

    if (report.invalidCpfCount > 0) {
      heading(doc, 'Quality alerts');
      bullet(doc, invalidCpfAlert(report.invalidCpfCount));
    }

    heading(doc, 'Recommendations');
    for (const rec of report.recommendations) {
      bullet(doc, rec);
    }

    doc.end();
  });
}

function heading(doc: PDFKit.PDFDocument, text: string): void {
  doc.moveDown(0.5);
  doc.fontSize(14).font('Helvetica-Bold').text(text);
  doc.moveDown(0.3);
}

function paragraph(doc: PDFKit.PDFDocument, text: string): void {
  doc.fontSize(11).font('Helvetica').text(text);
  doc.moveDown(0.2);
}

function bullet(doc: PDFKit.PDFDocument, text: string): void {
  doc.fontSize(11).font('Helvetica').text(`  •  ${text}`);
  doc.moveDown(0.2);
}
