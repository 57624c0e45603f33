/**
 * Injection-Wave Coupling
 *
 * One interaction record per injector describing how the fresh-mixture jet
 * at that injector interacts with a passing front.
 *
 * The wave phase is positional: 2π·θ_inj / D, as if the front passed every
 * injector once per revolution starting from θ = 0. Momentum coupling
 * compares jet momentum (unit density) with a nominal wave inertia.
 */

import type {
  Chemistry,
  Geometry,
  InjectionWaveInteraction,
  InteractionType,
  WavePropagation2D,
} from './types';
import { angularDistance } from './coordinates';
import { logDebug } from './debug-log';

export interface InjectionCouplingConfig {
  injectantDensity: number;         // kg/m³
  waveInertiaDensity: number;       // kg/m³
  disturbanceFraction: number;      // of C-J pressure
  neutralAngleMin: number;          // deg
  neutralAngleMax: number;          // deg
  interactionHalfWidth: number;     // rad
}

export const DEFAULT_INJECTION_COUPLING_CONFIG: InjectionCouplingConfig = {
  injectantDensity: 1.0,
  waveInertiaDensity: 1000.0,
  disturbanceFraction: 0.1,
  neutralAngleMin: 80,
  neutralAngleMax: 100,
  interactionHalfWidth: 0.1,
};

export class InjectionCouplingAnalyzer {
  private readonly config: InjectionCouplingConfig;

  constructor(config: Partial<InjectionCouplingConfig> = {}) {
    this.config = { ...DEFAULT_INJECTION_COUPLING_CONFIG, ...config };
  }

  /**
   * Perpendicular injection is neutral; jets angled with the front
   * (below the band) reinforce it, jets angled against it oppose it.
   */
  classifyInjectionAngle(injectionAngle: number): InteractionType {
    if (injectionAngle < this.config.neutralAngleMin) return 'reinforcing';
    if (injectionAngle > this.config.neutralAngleMax) return 'opposing';
    return 'neutral';
  }

  calculateMomentumCoupling(chemistry: Chemistry): number {
    const waveInertia = this.config.waveInertiaDensity * chemistry.detonationVelocity;
    if (!(waveInertia > 0)) return 0;
    return (chemistry.injectionVelocity * this.config.injectantDensity) / waveInertia;
  }

  analyze(geometry: Geometry, chemistry: Chemistry, wave: WavePropagation2D): InjectionWaveInteraction[] {
    const domainAngle = geometry.domainAngle;
    if (!(domainAngle > 0)) return [];

    const momentumCoupling = this.calculateMomentumCoupling(chemistry);
    const pressureDisturbance = this.config.disturbanceFraction * chemistry.detonationPressure;
    const interactionType = this.classifyInjectionAngle(geometry.injectionAngle);
    const gap = Math.max(0, geometry.outerRadius - geometry.innerRadius);
    const penetrationDepth = Math.min(geometry.injectionPenetration, gap);

    const interactions = geometry.injectorAngularPositions.map((injectorTheta, injectorIndex) => ({
      injectorIndex,
      injectorPositionTheta: injectorTheta,
      wavePhaseAtInjection: (2 * Math.PI * injectorTheta) / domainAngle,
      momentumCoupling,
      pressureDisturbance,
      interactionType,
      penetrationDepth,
      interactionRegion: wave.waveTrajectory.filter(
        (point) => angularDistance(point.theta, injectorTheta, domainAngle) <= this.config.interactionHalfWidth
      ),
    }));

    logDebug(
      'Injection',
      `${interactions.length} injectors, ${interactionType} at ${geometry.injectionAngle}°, coupling ${momentumCoupling.toExponential(3)}`
    );

    return interactions;
  }
}
