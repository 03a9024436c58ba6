import type { Appointment } from "../domain/Appointment";

// Appointment scheduling workflow.
// The step order is fixed: availability check, booking, confirmation.
// A failing step stops the run; the failure is logged and returned, not thrown.
// Only a run where every step succeeded records the creation and confirms.

export type SchedulingStep = "checkDoctorAvailability" | "makeAppointment" | "confirmAppointment";

export type SchedulingResult =
  | { readonly scheduled: true; readonly steps: readonly string[] }
  | {
      readonly scheduled: false;
      readonly failedStep: SchedulingStep;
      readonly error: string;
      readonly steps: readonly string[];
    };

export type AvailabilityCheck = (doctor: string, date: string) => boolean;

export abstract class AppointmentScheduler {
  abstract readonly channel: string;

  constructor(private readonly isAvailable: AvailabilityCheck = () => true) {}

  protected abstract describeAvailabilityCheck(appointment: Appointment): string;
  protected abstract makeAppointment(appointment: Appointment): string;
  protected abstract confirmAppointment(appointment: Appointment): string;

  private checkDoctorAvailability(appointment: Appointment): string {
    if (!this.isAvailable(appointment.doctor, appointment.date)) {
      throw new Error(`${appointment.doctor} is not available on ${appointment.date}`);
    }
    return this.describeAvailabilityCheck(appointment);
  }

  schedule(appointment: Appointment): SchedulingResult {
    const steps: string[] = [];
    const plan: ReadonlyArray<readonly [SchedulingStep, (a: Appointment) => string]> = [
      ["checkDoctorAvailability", (a) => this.checkDoctorAvailability(a)],
      ["makeAppointment", (a) => this.makeAppointment(a)],
      ["confirmAppointment", (a) => this.confirmAppointment(a)],
    ];

    for (const [name, run] of plan) {
      try {
        const message = run(appointment);
        console.log(`[Scheduling:${this.channel}] ${message}`);
        steps.push(message);
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        console.error(`[Scheduling:${this.channel}] ${name} failed: ${error}`);
        return { scheduled: false, failedStep: name, error, steps };
      }
    }

    appointment.recordCreation();
    appointment.confirm();
    return { scheduled: true, steps };
  }
}

export class OnlineScheduler extends AppointmentScheduler {
  readonly channel = "online";

  protected describeAvailabilityCheck(appointment: Appointment): string {
    return `Checked ${appointment.doctor} availability online for ${appointment.date}`;
  }

  protected makeAppointment(appointment: Appointment): string {
    return `Booked ${appointment.appointmentId} through the online system`;
  }

  protected confirmAppointment(appointment: Appointment): string {
    return `Confirmation for ${appointment.appointmentId} sent by SMS or email`;
  }
}

export class FrontDeskScheduler extends AppointmentScheduler {
  readonly channel = "front-desk";

  protected describeAvailabilityCheck(appointment: Appointment): string {
    return `Checked ${appointment.doctor} availability at the front desk for ${appointment.date}`;
  }

  protected makeAppointment(appointment: Appointment): string {
    return `Booked ${appointment.appointmentId} at the registry desk`;
  }

  protected confirmAppointment(appointment: Appointment): string {
    return `Confirmation for ${appointment.appointmentId} given by phone call`;
  }
}

export type SchedulingChannel = "online" | "front-desk";

export function schedulerFor(channel: SchedulingChannel, isAvailable?: AvailabilityCheck): AppointmentScheduler {
  return channel === "online" ? new OnlineScheduler(isAvailable) : new FrontDeskScheduler(isAvailable);
}
