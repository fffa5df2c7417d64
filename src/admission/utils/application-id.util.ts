export function formatApplicationId(year: number, serial: number): string {
  return `ADM${year}${String(serial).padStart(6, '0')}`;
}

// Must be changed on first login.
export function temporaryPasswordFor(applicationId: string): string {
  return `temp${applicationId.slice(-4)}`;
}
