// A billable service attached to an appointment. Price is non-negative.
export interface Service {
  readonly name: string;
  readonly price: number;
}

export function isSameService(a: Service, b: Service): boolean {
  return a.name === b.name && a.price === b.price;
}
