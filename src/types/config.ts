export interface ClinicConfig {
  student_calendar: string | null;
  clinic_calendar: string | null;
}

export interface ResolvedClinicConfig {
  student_calendar: string;
  clinic_calendar: string;
}
