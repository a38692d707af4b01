import type { RideSystem } from '../services/ride-system.service';

export interface ContextType {
  system: RideSystem;
}
