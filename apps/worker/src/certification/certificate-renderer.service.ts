import { Injectable } from '@nestjs/common';
import PDFDocument from 'pdfkit';
import { NorwoodVariant } from '@hairline/database';

export interface CertificateInput {
  certificationId: string;
  holderName: string;
  norwoodStage: number;
  norwoodVariant: NorwoodVariant | null;
  confidence: number;
  clinicalAssessment: string;
  certifiedAt: Date;
}

// ── Layout ─────────────────────────────────────────────────
const PAGE_MARGIN = 54;
const NAVY = '#1a365d';
const GOLD = '#b7912f';
const MUTED = '#4a5568';

export function formatStageLabel(
  stage: number,
  variant: NorwoodVariant | null,
): string {
  return `NORWOOD STAGE ${stage}${variant ?? ''}`;
}

export function formatConfidence(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

export function formatCertifiedDate(date: Date): string {
  return date.toLocaleDateString('en-US', {
    year: 'numeric',
    month: 'long',
    day: 'numeric',
    timeZone: 'UTC',
  });
}

/**
 * CertificateRendererService: draws the one-page certificate PDF.
 *
 * Output is a pure function of the input, so a retried diagnosis job
 * produces the same document for the same stored diagnosis.
 */
@Injectable()
export class CertificateRendererService {
  render(input: CertificateInput): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const doc = new PDFDocument({
        size: 'LETTER',
        layout: 'landscape',
        margin: PAGE_MARGIN,
        info: {
          Title: `Norwood certificate ${input.certificationId}`,
          CreationDate: input.certifiedAt,
        },
      });

      const chunks: Buffer[] = [];
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      this.draw(doc, input);
      doc.end();
    });
  }

  private draw(doc: PDFKit.PDFDocument, input: CertificateInput): void {
    const { width, height } = doc.page;
    const contentWidth = width - PAGE_MARGIN * 2;

    doc
      .lineWidth(3)
      .strokeColor(GOLD)
      .rect(24, 24, width - 48, height - 48)
      .stroke();
    doc
      .lineWidth(1)
      .rect(32, 32, width - 64, height - 64)
      .stroke();

    doc.y = PAGE_MARGIN + 10;

    doc
      .font('Times-Bold')
      .fontSize(30)
      .fillColor(NAVY)
      .text('Certificate of Norwood Classification', { align: 'center' });
    doc.moveDown(0.8);

    doc
      .font('Times-Italic')
      .fontSize(14)
      .fillColor(MUTED)
      .text('This is to certify that', { align: 'center' });
    doc.moveDown(0.4);

    doc
      .font('Times-Bold')
      .fontSize(24)
      .fillColor(NAVY)
      .text(input.holderName, { align: 'center' });
    doc.moveDown(0.4);

    doc
      .font('Times-Italic')
      .fontSize(14)
      .fillColor(MUTED)
      .text('has been assessed and classified as', { align: 'center' });
    doc.moveDown(0.6);

    doc
      .font('Helvetica-Bold')
      .fontSize(34)
      .fillColor(GOLD)
      .text(formatStageLabel(input.norwoodStage, input.norwoodVariant), {
        align: 'center',
      });
    doc.moveDown(0.3);

    doc
      .font('Helvetica')
      .fontSize(11)
      .fillColor(MUTED)
      .text(`Confidence: ${formatConfidence(input.confidence)}`, {
        align: 'center',
      });
    doc.moveDown(1);

    doc
      .font('Times-Roman')
      .fontSize(11)
      .fillColor('black')
      .text(input.clinicalAssessment, PAGE_MARGIN + 40, doc.y, {
        width: contentWidth - 80,
        align: 'justify',
      });

    doc
      .font('Helvetica')
      .fontSize(10)
      .fillColor(MUTED)
      .text(
        `Certified ${formatCertifiedDate(input.certifiedAt)}  ·  ID ${input.certificationId}`,
        PAGE_MARGIN,
        height - PAGE_MARGIN - 30,
        { width: contentWidth, align: 'center' },
      );
    doc
      .fontSize(8)
      .text(
        'For entertainment and self-tracking. Not a medical diagnosis.',
        PAGE_MARGIN,
        height - PAGE_MARGIN - 14,
        { width: contentWidth, align: 'center' },
      );
  }
}
