import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { TypeChartService } from './tables/type-chart.service.js';
import { TurnOrderService } from './turn-order/turn-order.service.js';
import { DamageEstimatorService } from './damage/damage-estimator.service.js';
import { ViableSwitchService } from './filter/viable-switch.service.js';
import { ActionFilterService } from './filter/action-filter.service.js';
import { FallbackSelectorService } from './fallback/fallback-selector.service.js';

const providers = [
  // Layer 1: 정적 표
  TypeChartService,
  RngService,
  // Layer 2: 추정
  TurnOrderService,
  DamageEstimatorService,
  // Layer 3: 축소/대체
  ViableSwitchService,
  ActionFilterService,
  FallbackSelectorService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
