export enum GeneratedBy {
  STUDENT = 'student',
  STAFF = 'staff',
}
