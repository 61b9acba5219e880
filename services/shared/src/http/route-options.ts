import { withUnitOfWork, UnitOfWorkRunner } from '../db/unit-of-work';
import {
     CommerceServices,
     createCommerceServices,
     reservationOptionsFromEnv,
} from '../services/container';

/** Options every route plugin accepts; tests pass an in-memory runner */
export interface ApiRouteOptions {
     unitOfWork?: UnitOfWorkRunner;
     services?: CommerceServices;
}

export interface RouteDependencies {
     run: UnitOfWorkRunner;
     services: CommerceServices;
}

export function resolveRouteDependencies(options: ApiRouteOptions): RouteDependencies {
     return {
          run: options.unitOfWork ?? withUnitOfWork,
          services: options.services ?? createCommerceServices(reservationOptionsFromEnv()),
     };
}
