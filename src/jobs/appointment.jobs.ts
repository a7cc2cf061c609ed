import { fullName } from '../types/user.types';
import { addDays, endOfDay, startOfDay } from '../utils/dates';
import { emailTemplates, labelOf } from '../utils/email_templates';
import type { EmailMessage } from '../utils/email_service';
import { DeliveryResult, JobContext, deliverEach } from './job.context';

type ScheduleEntry = Parameters<typeof emailTemplates.vetDailySchedule>[0]['entries'][number];

const NO_SHOW_GRACE_MS = 60 * 60 * 1000;

/**
 * Emails the guardian of every booked or confirmed appointment scheduled for
 * tomorrow that has not had a reminder yet, then flags it as reminded.
 */
export async function sendAppointmentReminders(ctx: JobContext): Promise<DeliveryResult> {
  const { repos } = ctx;
  const tomorrow = addDays(ctx.now(), 1);
  const appointments = await repos.appointments.list({
    from: startOfDay(tomorrow),
    to: endOfDay(tomorrow),
    statuses: ['booked', 'confirmed'],
    reminderSent: false,
  });

  const messages: EmailMessage[] = [];
  const appointmentIds: number[] = [];
  for (const appointment of appointments) {
    const [guardian, patient, vet] = await Promise.all([
      repos.users.findById(appointment.guardian_id),
      repos.patients.findById(appointment.patient_id),
      appointment.vet_id ? repos.users.findById(appointment.vet_id) : Promise.resolve(undefined),
    ]);
    if (!guardian || !patient) {
      console.warn(`[Jobs] reminders: appointment #${appointment.id} has no guardian or patient, skipping`);
      continue;
    }

    const content = emailTemplates.appointmentReminder({
      clinicName: ctx.clinicName,
      guardianName: fullName(guardian),
      patientName: patient.name,
      scheduledAt: appointment.scheduled_at,
      type: labelOf(appointment.type),
      vetName: vet ? fullName(vet) : null,
      reason: appointment.reason,
    });
    messages.push({ to: guardian.email, ...content });
    appointmentIds.push(appointment.id);
  }

  const result = await deliverEach(ctx, 'reminders', messages, async (_message, index) => {
    await repos.appointments.update(appointmentIds[index], {
      reminder_sent: true,
      reminder_sent_at: ctx.now(),
    });
  });
  console.log(`[Jobs] reminders: ${result.sent} sent, ${result.failed} failed`);
  return result;
}

/** Booked or confirmed appointments that started over an hour ago become no-shows. */
export async function markNoShows(ctx: JobContext): Promise<{ marked: number }> {
  const now = ctx.now();
  const marked = await ctx.repos.appointments.markNoShowsBefore(new Date(now.getTime() - NO_SHOW_GRACE_MS), now);
  console.log(`[Jobs] no-show sweep: ${marked} appointment(s) marked as no-show`);
  return { marked };
}

export async function sendVetDailySchedules(ctx: JobContext): Promise<DeliveryResult> {
  const { repos } = ctx;
  const today = ctx.now();
  const vets = await repos.users.listActiveByRoles(['vet']);

  const messages: EmailMessage[] = [];
  for (const vet of vets) {
    const appointments = await repos.appointments.list({
      vetId: vet.id,
      from: startOfDay(today),
      to: endOfDay(today),
      excludeStatuses: ['cancelled', 'no_show'],
    });
    if (appointments.length === 0) continue;

    const entries: ScheduleEntry[] = [];
    for (const appointment of appointments) {
      const [patient, guardian] = await Promise.all([
        repos.patients.findById(appointment.patient_id),
        repos.users.findById(appointment.guardian_id),
      ]);
      entries.push({
        time: appointment.scheduled_at,
        patientName: patient?.name ?? `patient #${appointment.patient_id}`,
        guardianName: guardian ? fullName(guardian) : '',
        type: labelOf(appointment.type),
      });
    }

    const content = emailTemplates.vetDailySchedule({
      clinicName: ctx.clinicName,
      vetName: fullName(vet),
      day: today,
      entries,
    });
    messages.push({ to: vet.email, ...content });
  }

  const result = await deliverEach(ctx, 'vet schedule', messages);
  console.log(`[Jobs] vet schedule: ${result.sent} sent, ${result.failed} failed`);
  return result;
}
