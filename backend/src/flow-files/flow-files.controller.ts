import {
  Controller,
  Delete,
  Get,
  Logger,
  Param,
  ParseIntPipe,
} from '@nestjs/common';
import { FlowFilesService, FlowFileSummary } from './flow-files.service';

/**
 * FlowFilesController
 *
 * Endpoints:
 * - GET /flow-files - List imported files
 * - GET /flow-files/:id - One file with its row counts
 * - DELETE /flow-files/:id - Purge a file and its readings
 */
@Controller('flow-files')
export class FlowFilesController {
  private readonly logger = new Logger(FlowFilesController.name);

  constructor(private readonly flowFilesService: FlowFilesService) {}

  @Get()
  async listFlowFiles(): Promise<{ flowFiles: FlowFileSummary[] }> {
    const flowFiles = await this.flowFilesService.listFlowFiles();
    return { flowFiles };
  }

  @Get(':id')
  async getFlowFile(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<FlowFileSummary> {
    return this.flowFilesService.getFlowFile(id);
  }

  @Delete(':id')
  async purgeFlowFile(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<{ id: number; filename: string }> {
    this.logger.log(`DELETE /flow-files/${id}`);
    return this.flowFilesService.purgeFlowFile(id);
  }
}
