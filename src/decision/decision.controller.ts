import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { DecisionService } from './decision.service.js';
import { ConstantSnapshotProvider } from './ports/snapshot-provider.port.js';
import {
  ListDecisionsQuerySchema,
  SubmitSnapshotBodySchema,
  type ListDecisionsQuery,
  type SubmitSnapshotBody,
} from './dto/submit-snapshot.dto.js';

@Controller('v1/battles/:battleId')
export class DecisionController {
  constructor(private readonly decisionService: DecisionService) {}

  @Post('decisions')
  async decide(
    @Param('battleId') battleId: string,
    @Body(new ZodValidationPipe(SubmitSnapshotBodySchema)) body: SubmitSnapshotBody,
  ) {
    return this.decisionService.decide(battleId, new ConstantSnapshotProvider(body));
  }

  @Get('decisions')
  async listDecisions(
    @Param('battleId') battleId: string,
    @Query(new ZodValidationPipe(ListDecisionsQuerySchema)) query: ListDecisionsQuery,
  ) {
    return this.decisionService.listDecisions(battleId, query.limit);
  }

  @Get('memory')
  async getMemory(@Param('battleId') battleId: string) {
    return this.decisionService.getMemory(battleId);
  }

  @Delete('memory')
  async forgetBattle(@Param('battleId') battleId: string) {
    return this.decisionService.forgetBattle(battleId);
  }
}
