import { beforeEach, describe, it, expect, vi, type Mock } from 'vitest';
import { createMemoryRepositories } from '../testing/memory.repositories';
import { addAppointment, addLot, addPatient, addProduct, addUser } from '../testing/fixtures';
import type { Repositories } from '../repositories';
import { MailerNotConfiguredError, createSmtpMailer, type EmailMessage } from '../utils/email_service';
import { JobContext } from '../jobs/job.context';
import { markNoShows, sendAppointmentReminders, sendVetDailySchedules } from '../jobs/appointment.jobs';
import { checkExpiringLots, checkStockLevels, sendInventoryValuation } from '../jobs/inventory.jobs';
import { runJob } from '../jobs';
import { fullName } from '../types/user.types';

const NOW = new Date(2026, 9, 19, 9, 0);

describe('background jobs', () => {
  let repos: Repositories;
  let mailer: Mock<(message: EmailMessage) => Promise<void>>;
  let ctx: JobContext;

  const sentTo = () => mailer.mock.calls.map(([message]) => message.to);

  beforeEach(() => {
    repos = createMemoryRepositories();
    mailer = vi.fn<(message: EmailMessage) => Promise<void>>().mockResolvedValue(undefined);
    ctx = { repos, mailer, now: () => NOW, clinicName: 'Test Clinic' };
  });

  describe('appointment reminders', () => {
    it('should remind guardians of tomorrow bookings once', async () => {
      const guardian = await addUser(repos, 'guardian');
      const patient = await addPatient(repos, guardian, { name: 'Luna' });
      const due = await addAppointment(repos, patient, { scheduled_at: new Date(2026, 9, 20, 10, 0) });
      await addAppointment(repos, patient, { scheduled_at: new Date(2026, 9, 20, 11, 0), status: 'cancelled' });
      await addAppointment(repos, patient, { scheduled_at: new Date(2026, 9, 20, 12, 0), reminder_sent: true });
      await addAppointment(repos, patient, { scheduled_at: new Date(2026, 9, 22, 10, 0) });

      expect(await sendAppointmentReminders(ctx)).toEqual({ sent: 1, failed: 0 });
      expect(sentTo()).toEqual([guardian.email]);
      expect(mailer.mock.calls[0][0].subject).toBe('Appointment reminder - Luna');
      expect(mailer.mock.calls[0][0].text).toContain('Date and time: 20/10/2026 at 10:00');

      const stored = await repos.appointments.findById(due.id);
      expect(stored?.reminder_sent).toBe(true);
      expect(stored?.reminder_sent_at).toEqual(NOW);

      expect(await sendAppointmentReminders(ctx)).toEqual({ sent: 0, failed: 0 });
      expect(mailer).toHaveBeenCalledTimes(1);
    });

    it('should skip a failed send and leave that appointment pending', async () => {
      const ana = await addUser(repos, 'guardian');
      const bob = await addUser(repos, 'guardian');
      const first = await addAppointment(repos, await addPatient(repos, ana), { scheduled_at: new Date(2026, 9, 20, 9, 0) });
      const second = await addAppointment(repos, await addPatient(repos, bob), { scheduled_at: new Date(2026, 9, 20, 10, 0) });
      mailer.mockRejectedValueOnce(new Error('smtp down'));

      expect(await sendAppointmentReminders(ctx)).toEqual({ sent: 1, failed: 1 });
      expect(sentTo()).toEqual([ana.email, bob.email]);
      expect((await repos.appointments.findById(first.id))?.reminder_sent).toBe(false);
      expect((await repos.appointments.findById(second.id))?.reminder_sent).toBe(true);
    });
  });

  it('should mark overdue bookings as no-show after the grace hour', async () => {
    const patient = await addPatient(repos, await addUser(repos, 'guardian'));
    const late = await addAppointment(repos, patient, { scheduled_at: new Date(2026, 9, 19, 7, 30) });
    const lateConfirmed = await addAppointment(repos, patient, {
      scheduled_at: new Date(2026, 9, 19, 7, 0),
      status: 'confirmed',
    });
    const grace = await addAppointment(repos, patient, { scheduled_at: new Date(2026, 9, 19, 8, 30) });
    const started = await addAppointment(repos, patient, {
      scheduled_at: new Date(2026, 9, 19, 7, 0),
      status: 'in_progress',
    });

    expect(await markNoShows(ctx)).toEqual({ marked: 2 });
    const statuses = await Promise.all(
      [late, lateConfirmed, grace, started].map(async (a) => (await repos.appointments.findById(a.id))?.status)
    );
    expect(statuses).toEqual(['no_show', 'no_show', 'booked', 'in_progress']);
    expect((await repos.appointments.findById(late.id))?.no_show_at).toEqual(NOW);
  });

  it('should mail each vet with visits today their schedule', async () => {
    const guardian = await addUser(repos, 'guardian');
    const busy = await addUser(repos, 'vet');
    await addUser(repos, 'vet');
    const patient = await addPatient(repos, guardian, { name: 'Luna' });
    await addAppointment(repos, patient, { vet_id: busy.id, scheduled_at: new Date(2026, 9, 19, 10, 0) });
    await addAppointment(repos, patient, {
      vet_id: busy.id,
      scheduled_at: new Date(2026, 9, 19, 11, 0),
      status: 'cancelled',
    });

    expect(await sendVetDailySchedules(ctx)).toEqual({ sent: 1, failed: 0 });
    const [[message]] = mailer.mock.calls;
    expect(message.to).toBe(busy.email);
    expect(message.subject).toBe('Schedule for 19/10/2026');
    expect(message.text).toContain(`- 10:00 - Luna (${fullName(guardian)}) - General consultation`);
    expect(message.text).toContain('Total appointments: 1');
  });

  describe('stock alerts', () => {
    it('should alert admins and receptionists about products under their minimum', async () => {
      const admin = await addUser(repos, 'admin');
      const desk = await addUser(repos, 'receptionist');
      await addUser(repos, 'receptionist', { active: false });
      await addUser(repos, 'vet');
      const gauze = await addProduct(repos, { name: 'Gauze', min_stock: 10 });
      await addLot(repos, gauze, { initial_stock: 5 });
      const stocked = await addProduct(repos, { min_stock: 10 });
      await addLot(repos, stocked, { initial_stock: 10 });

      expect(await checkStockLevels(ctx)).toEqual({ lowStock: 1, sent: 2, failed: 0 });
      expect(sentTo()).toEqual([admin.email, desk.email]);
      expect(mailer.mock.calls[0][0].text).toContain(`- ${gauze.code} - Gauze (Medication): stock 5, minimum 10`);
    });

    it('should stay quiet when every product is stocked', async () => {
      await addUser(repos, 'admin');
      const product = await addProduct(repos);
      await addLot(repos, product, { initial_stock: 50 });

      expect(await checkStockLevels(ctx)).toEqual({ lowStock: 0, sent: 0, failed: 0 });
      expect(mailer).not.toHaveBeenCalled();
    });
  });

  describe('expiry scan', () => {
    it('should report each lot once per day', async () => {
      const admin = await addUser(repos, 'admin');
      const vet = await addUser(repos, 'vet');
      await addUser(repos, 'guardian');
      const product = await addProduct(repos, { name: 'Vaccine' });
      const soon = await addLot(repos, product, { lot_number: 'V-1', expires_on: '2026-11-08', initial_stock: 100 });
      await addLot(repos, product, { lot_number: 'V-0', expires_on: '2026-10-01', initial_stock: 3 });
      await addLot(repos, product, { lot_number: 'V-2', expires_on: '2027-10-01' });

      expect(await checkExpiringLots(ctx)).toEqual({ expiring: 1, expired: 1, sent: 2, failed: 0 });
      expect(sentTo()).toEqual([admin.email, vet.email]);
      const { text, subject } = mailer.mock.calls[0][0];
      expect(subject).toBe('Expiry alert - Test Clinic');
      expect(text).toContain(`- ${product.code} - Vaccine (lot V-1): expires 08/11/2026 (20 days) - stock 100`);
      expect(text).toContain(`- ${product.code} - Vaccine (lot V-0): expired 01/10/2026 - stock 3`);
      expect((await repos.lots.findById(soon.id))?.expiry_alerted_on).toBe('2026-10-19');

      expect(await checkExpiringLots(ctx)).toEqual({ expiring: 0, expired: 0, sent: 0, failed: 0 });
      expect(mailer).toHaveBeenCalledTimes(2);
    });

    it('should try again later when no alert could be delivered', async () => {
      await addUser(repos, 'admin');
      const lot = await addLot(repos, await addProduct(repos), { expires_on: '2026-10-25' });
      mailer.mockRejectedValueOnce(new Error('smtp down'));

      expect(await checkExpiringLots(ctx)).toEqual({ expiring: 1, expired: 0, sent: 0, failed: 1 });
      expect((await repos.lots.findById(lot.id))?.expiry_alerted_on).toBeNull();

      expect(await checkExpiringLots(ctx)).toEqual({ expiring: 1, expired: 0, sent: 1, failed: 0 });
    });
  });

  describe('without SMTP settings', () => {
    const unconfigured = () =>
      createSmtpMailer({ host: undefined, port: 587, user: undefined, pass: undefined, from: undefined, timeoutMs: 1000 });

    it('should reject every send', async () => {
      await expect(unconfigured()({ to: 'a@clinic.test', subject: 'Hi', text: 'Hello' })).rejects.toBeInstanceOf(
        MailerNotConfiguredError
      );
    });

    it('should leave reminders pending', async () => {
      const patient = await addPatient(repos, await addUser(repos, 'guardian'));
      const due = await addAppointment(repos, patient, { scheduled_at: new Date(2026, 9, 20, 10, 0) });

      expect(await sendAppointmentReminders({ ...ctx, mailer: unconfigured() })).toEqual({ sent: 0, failed: 1 });
      expect((await repos.appointments.findById(due.id))?.reminder_sent).toBe(false);
    });

    it('should not mark lots as alerted', async () => {
      await addUser(repos, 'admin');
      const lot = await addLot(repos, await addProduct(repos), { expires_on: '2026-10-25' });

      expect(await checkExpiringLots({ ...ctx, mailer: unconfigured() })).toEqual({
        expiring: 1,
        expired: 0,
        sent: 0,
        failed: 1,
      });
      expect((await repos.lots.findById(lot.id))?.expiry_alerted_on).toBeNull();
    });
  });

  it('should value stock on hand at purchase price', async () => {
    const admin = await addUser(repos, 'admin');
    await addUser(repos, 'receptionist');
    const syringes = await addProduct(repos, { purchase_price: 2.5 });
    const gloves = await addProduct(repos, { purchase_price: 1.333 });
    const samples = await addProduct(repos, { purchase_price: null });
    await addLot(repos, syringes, { initial_stock: 10 });
    await addLot(repos, gloves, { initial_stock: 3 });
    await addLot(repos, samples, { initial_stock: 7 });

    expect(await sendInventoryValuation(ctx)).toEqual({ products: 3, totalValue: 29, sent: 1, failed: 0 });
    expect(sentTo()).toEqual([admin.email]);
    expect(mailer.mock.calls[0][0].subject).toBe('Monthly inventory report - October 2026');
    expect(mailer.mock.calls[0][0].text).toContain('Estimated inventory value: $29.00');
  });

  it('should run a registered job by name', async () => {
    expect(await runJob('no-show-sweep', ctx)).toEqual({ marked: 0 });
  });
});
