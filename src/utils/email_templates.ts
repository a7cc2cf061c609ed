import { formatDate, formatTime } from './dates';

export interface EmailContent {
  subject: string;
  text: string;
}

const money = (value: number) =>
  value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export const emailTemplates = {
  appointmentReminder: (data: {
    clinicName: string;
    guardianName: string;
    patientName: string;
    scheduledAt: Date;
    type: string;
    vetName: string | null;
    reason: string;
  }): EmailContent => ({
    subject: `Appointment reminder - ${data.patientName}`,
    text: `Dear ${data.guardianName},

This is a reminder that ${data.patientName} has an appointment with us.

Date and time: ${formatDate(data.scheduledAt)} at ${formatTime(data.scheduledAt)}
Type: ${data.type}
Vet: ${data.vetName ?? 'To be assigned'}
Reason: ${data.reason}

Please arrive 10 minutes early. If you need to cancel or reschedule, contact us as soon as possible.

${data.clinicName}`,
  }),

  vetDailySchedule: (data: {
    clinicName: string;
    vetName: string;
    day: Date;
    entries: { time: Date; patientName: string; guardianName: string; type: string }[];
  }): EmailContent => {
    const lines = data.entries.map(
      (e) => `- ${formatTime(e.time)} - ${e.patientName} (${e.guardianName}) - ${e.type}`
    );
    return {
      subject: `Schedule for ${formatDate(data.day)}`,
      text: `Dear Dr. ${data.vetName},

Your appointments for today, ${formatDate(data.day)}:

${lines.join('\n')}

Total appointments: ${data.entries.length}

${data.clinicName}`,
    };
  },

  lowStock: (data: {
    clinicName: string;
    products: { code: string; name: string; category: string; total: number; min: number }[];
  }): EmailContent => ({
    subject: `Low stock alert - ${data.products.length} product(s)`,
    text: `The following products are below their minimum stock:

${data.products.map((p) => `- ${p.code} - ${p.name} (${p.category}): stock ${p.total}, minimum ${p.min}`).join('\n')}

Please review the inventory and consider placing an order.

${data.clinicName}`,
  }),

  expiryAlert: (data: {
    clinicName: string;
    expired: { code: string; name: string; lotNumber: string; expiresOn: Date; stock: number }[];
    expiring: { code: string; name: string; lotNumber: string; expiresOn: Date; days: number; stock: number }[];
  }): EmailContent => {
    const sections: string[] = [];
    if (data.expired.length > 0) {
      sections.push(`EXPIRED LOTS WITH STOCK (${data.expired.length}):
${data.expired
  .map((l) => `- ${l.code} - ${l.name} (lot ${l.lotNumber}): expired ${formatDate(l.expiresOn)} - stock ${l.stock}`)
  .join('\n')}

Remove these products from the inventory immediately.`);
    }
    if (data.expiring.length > 0) {
      sections.push(`LOTS EXPIRING SOON (${data.expiring.length}):
${data.expiring
  .map(
    (l) =>
      `- ${l.code} - ${l.name} (lot ${l.lotNumber}): expires ${formatDate(l.expiresOn)} (${l.days} days) - stock ${l.stock}`
  )
  .join('\n')}

Use these products first or arrange a return.`);
    }
    return {
      subject: `Expiry alert - ${data.clinicName}`,
      text: `${sections.join('\n\n')}

${data.clinicName}`,
    };
  },

  inventoryValuation: (data: {
    clinicName: string;
    month: string;
    productCount: number;
    totalValue: number;
  }): EmailContent => ({
    subject: `Monthly inventory report - ${data.month}`,
    text: `Inventory report for ${data.month}

Active products: ${data.productCount}
Estimated inventory value: $${money(data.totalValue)}

The full breakdown is available in the administration console.

${data.clinicName}`,
  }),
};

/** 'general_consultation' -> 'General consultation' */
export function labelOf(value: string): string {
  const words = value.replace(/_/g, ' ');
  return words.charAt(0).toUpperCase() + words.slice(1);
}
