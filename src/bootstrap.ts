// Ensure env is loaded before accessing process.env
import './config/env.config';

import { container, KEYS } from './container';
import { pool } from './db/pool';
import { TournamentRepository } from './modules/tournaments/tournament.repository';
import { TournamentService } from './modules/tournaments/tournament.service';

function bootstrap(): void {
  // Database
  container.register(KEYS.POOL, () => pool);

  // Repositories
  container.register(
    KEYS.TOURNAMENT_REPO,
    () => new TournamentRepository(container.resolve(KEYS.POOL))
  );

  // Services
  container.register(
    KEYS.TOURNAMENT_SERVICE,
    () => new TournamentService(container.resolve(KEYS.TOURNAMENT_REPO))
  );
}

// Auto-run bootstrap when this module is imported
bootstrap();
