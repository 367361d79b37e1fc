import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { AgentService } from './agent.service';
import { AgentProcessDto } from './agent.dto';
import { anchorFrom } from '../common/clock';
import type { AgentResponse } from './agent.types';

@Controller('agent')
export class AgentController {
  constructor(private readonly agentService: AgentService) {}

  @Post('process')
  @HttpCode(200)
  process(@Body() dto: AgentProcessDto): AgentResponse {
    return this.agentService.process(dto.text, anchorFrom(dto.now));
  }
}
