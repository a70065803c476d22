import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Stateless services (PathFinder, BehaviorModeController, SteeringSystem) and
 * the per-process round machinery (DayNightCycle, RoundOrchestrator,
 * RoundRunner) are singletons within a container.
 *
 * @module config
 */
import type { NavigationConfig } from "../shared/constants/NavigationConstants";
import { PathFinder } from "../domain/simulation/systems/navigation/PathFinder";
import { BehaviorModeController } from "../domain/simulation/systems/agents/BehaviorModeController";
import { SteeringSystem } from "../domain/simulation/systems/agents/SteeringSystem";
import { DayNightCycle } from "../domain/simulation/systems/core/DayNightCycle";
import { RoundOrchestrator } from "../domain/simulation/core/RoundOrchestrator";
import { RoundRunner, systemClock, type Clock } from "../domain/simulation/core/RoundRunner";

/**
 * Builds a container around the given tunables. Tests pass their own
 * config and clock; the default container uses the environment-resolved
 * {@link CONFIG}.
 */
export function createContainer(
  navigation: NavigationConfig = CONFIG.NAVIGATION,
  clock: Clock = systemClock,
): Container {
  const container = new Container();

  container.bind<NavigationConfig>(TYPES.NavigationConfig).toConstantValue(navigation);
  container.bind<Clock>(TYPES.Clock).toConstantValue(clock);

  container.bind<PathFinder>(TYPES.PathFinder).to(PathFinder).inSingletonScope();

  container
    .bind<BehaviorModeController>(TYPES.BehaviorModeController)
    .to(BehaviorModeController)
    .inSingletonScope();

  container.bind<SteeringSystem>(TYPES.SteeringSystem).to(SteeringSystem).inSingletonScope();

  container.bind<DayNightCycle>(TYPES.DayNightCycle).to(DayNightCycle).inSingletonScope();

  container
    .bind<RoundOrchestrator>(TYPES.RoundOrchestrator)
    .to(RoundOrchestrator)
    .inSingletonScope();

  container.bind<RoundRunner>(TYPES.RoundRunner).to(RoundRunner).inSingletonScope();

  return container;
}

export const container = createContainer();
