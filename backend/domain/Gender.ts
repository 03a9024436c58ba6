// Recognized gender codes. Anything else is rejected by the setter path.

export enum Gender {
  Male = "m",
  Female = "f",
}

export function isGender(value: string): value is Gender {
  return value === Gender.Male || value === Gender.Female;
}
