import { NorwoodVariant } from '@hairline/database';
import {
  CertificateRendererService,
  formatCertifiedDate,
  formatConfidence,
  formatStageLabel,
} from './certificate-renderer.service';

describe('certificate formatting', () => {
  it('appends the variant letter to the stage', () => {
    expect(formatStageLabel(4, NorwoodVariant.ANTERIOR)).toBe('NORWOOD STAGE 4A');
    expect(formatStageLabel(3, NorwoodVariant.VERTEX)).toBe('NORWOOD STAGE 3V');
    expect(formatStageLabel(6, null)).toBe('NORWOOD STAGE 6');
  });

  it('prints confidence as a whole percentage', () => {
    expect(formatConfidence(0.873)).toBe('87%');
    expect(formatConfidence(0.29)).toBe('29%');
    expect(formatConfidence(1)).toBe('100%');
  });

  it('formats the certified date in UTC', () => {
    expect(formatCertifiedDate(new Date('2026-03-01T23:30:00Z'))).toBe(
      'March 1, 2026',
    );
  });
});

describe('CertificateRendererService', () => {
  it('renders a PDF document', async () => {
    const renderer = new CertificateRendererService();

    const pdf = await renderer.render({
      certificationId: '01CERT00000000000000000001',
      holderName: 'Test Holder',
      norwoodStage: 3,
      norwoodVariant: NorwoodVariant.VERTEX,
      confidence: 0.82,
      clinicalAssessment: 'Bilateral temple recession with early vertex thinning.',
      certifiedAt: new Date('2026-03-01T12:00:00Z'),
    });

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(pdf.length).toBeGreaterThan(1000);
  });
});
