import type { RideSystem } from '../services/ride-system.service';
import type { ContextType } from '../types';

export const context = (system: RideSystem): ContextType => ({ system });
