export enum Grade {
  O = 'O', // Outstanding
  A_PLUS = 'A+',
  A = 'A',
  B_PLUS = 'B+',
  B = 'B',
  C = 'C',
  P = 'P', // Pass
  F = 'F',
  AB = 'AB', // Absent
  MP = 'MP', // Malpractice
}
