import type { Repositories } from '../repositories';
import type { InventoryService } from '../inventory/inventory.service';
import { JobContext } from '../jobs/job.context';
import { JobName, runJob } from '../jobs';
import { endOfDay, startOfDay } from '../utils/dates';

export class AdminService {
  constructor(
    private readonly repos: Repositories,
    private readonly inventory: InventoryService,
    private readonly jobContext: JobContext
  ) {}

  async stats() {
    const now = this.jobContext.now();
    const [usersByRole, patients, activePatients, appointmentsByStatus, today, activeProducts, lowStock, expiredLots] =
      await Promise.all([
        this.repos.users.countByRole(),
        this.repos.patients.count({}),
        this.repos.patients.count({ active: true }),
        this.repos.appointments.countByStatus(),
        this.repos.appointments.list({ from: startOfDay(now), to: endOfDay(now) }),
        this.repos.products.list({ active: true }),
        this.inventory.lowStock(),
        this.inventory.expiredLots(),
      ]);

    return {
      users: usersByRole,
      patients: { total: patients, active: activePatients },
      appointments: { by_status: appointmentsByStatus, today: today.length },
      inventory: {
        active_products: activeProducts.length,
        low_stock: lowStock.length,
        expired_lots: expiredLots.length,
      },
    };
  }

  async auditLogs(page: number, limit: number) {
    const { total, items } = await this.repos.audit.list({ limit, offset: (page - 1) * limit });
    return { page, limit, total, items };
  }

  async runJob(name: JobName) {
    console.log(`[Admin] running job ${name} on demand`);
    return runJob(name, this.jobContext);
  }
}
