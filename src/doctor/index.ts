export type { CheckStatus, DoctorCheck, DoctorReport } from './types.js';
export { createDoctor } from './doctor.js';
export type { Doctor, DoctorOptions } from './doctor.js';
