// Handler-role vocabulary. Role checks are exact, case-sensitive matches.

export enum StaffRole {
  FrontLine = "front-line",
  Department = "department",
  Chief = "chief",
}

export const DIAGNOSIS_CHANGE_ROLES: readonly StaffRole[] = [StaffRole.FrontLine, StaffRole.Department, StaffRole.Chief];
