export enum AnalysisConfidence {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
}
