import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ProcessCandidateUseCase } from '../application/use-cases';
import type { ProcessCandidateResult } from '../application/use-cases';
import { GuardStatusService } from '../application/guard-status.service';
import type { GuardStatus } from '../application/guard-status.service';
import { SubmitCandidateDto } from '../application/dto/candidate.dto';

@ApiTags('guard')
@Controller('guard')
export class GuardController {
  constructor(
    private readonly processCandidateUseCase: ProcessCandidateUseCase,
    private readonly guardStatusService: GuardStatusService,
  ) {}

  @Post('candidates')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Submit a decoded candidate from the optical decoder',
    description:
      'Rejected candidates are a normal outcome. An accepted candidate triggers at most one unlock per cooldown episode.',
  })
  @ApiResponse({ status: 200, description: 'Candidate evaluated' })
  @ApiResponse({ status: 400, description: 'Malformed request body' })
  submitCandidate(
    @Body() dto: SubmitCandidateDto,
  ): Promise<ProcessCandidateResult> {
    return this.processCandidateUseCase.execute({
      text: dto.text,
      points: dto.points,
    });
  }

  @Get('status')
  @ApiOperation({ summary: 'Current gate phase and cooldown' })
  getStatus(): GuardStatus {
    return this.guardStatusService.getStatus();
  }
}
