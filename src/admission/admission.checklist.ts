import { AdmissionApplication } from './entities/admission-application.entity';
import { parseJsonRecord, parseJsonStringList } from '../common/utils/json-column.util';

export const DEFAULT_REQUIRED_DOCUMENTS: readonly string[] = [
  '10th Mark Sheet',
  '12th Mark Sheet',
  'Transfer Certificate',
  'Aadhar Card',
  'Passport Photo',
  'Caste Certificate (if applicable)',
];

type ChecklistHolder = Pick<AdmissionApplication, 'documentsRequired' | 'documentsVerified'>;

export function getDocumentsVerified(app: ChecklistHolder): Record<string, boolean> {
  return parseJsonRecord(app.documentsVerified);
}

export function setDocumentsVerified(app: ChecklistHolder, documents: Record<string, boolean>) {
  app.documentsVerified = JSON.stringify(documents);
}

export function getDocumentsRequired(app: ChecklistHolder): string[] {
  return parseJsonStringList(app.documentsRequired);
}

export function setDocumentsRequired(app: ChecklistHolder, documents: readonly string[]) {
  app.documentsRequired = JSON.stringify(documents);
}

/** Replaces the checklist; every item starts unverified. */
export function resetChecklist(app: ChecklistHolder, documents: readonly string[]) {
  const unique = [...new Set(documents)];
  setDocumentsRequired(app, unique);
  setDocumentsVerified(app, Object.fromEntries(unique.map((doc) => [doc, false])));
}

export function pendingDocuments(app: ChecklistHolder): string[] {
  const verified = getDocumentsVerified(app);
  return getDocumentsRequired(app).filter((doc) => !verified[doc]);
}
