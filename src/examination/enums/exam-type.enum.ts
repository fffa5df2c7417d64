export enum ExamType {
  INTERNAL = 'internal',
  SEMESTER = 'semester',
  FINAL = 'final',
  SUPPLEMENTARY = 'supplementary',
}
