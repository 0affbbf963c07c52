import type { CooldownLedger } from '../admission/cooldownLedger';
import type { FleetMonitor } from '../fleet/ecs';
import type { RouteHandler } from '../router';

export interface FleetDeps {
  fleet: FleetMonitor;
  ledger: Pick<CooldownLedger, 'size'>;
  maxOccupancy: number;
  env: string;
  databaseReady: () => boolean;
}

export const createFleetHandlers = (deps: FleetDeps) => {
  const health: RouteHandler = (req, res) => {
    res.status(200).json({ status: 'ok', env: deps.env, database: deps.databaseReady() ? 'up' : 'down' });
  };

  const status: RouteHandler = async (req, res) => {
    const occupancy = await deps.fleet.occupancy(req);
    res.status(200).json({
      ...occupancy,
      maxOccupancy: deps.maxOccupancy,
      saturated: occupancy.total >= deps.maxOccupancy,
      // repositories still inside their cooldown horizon
      recentAdmissions: deps.ledger.size(),
    });
  };

  return { health, status };
};
