import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { FlowFile } from '../database/entities/flow-file.entity';

/**
 * FlowFile summary as exposed to the admin surface
 */
export interface FlowFileSummary {
  id: number;
  filename: string;
  importedAt: Date;
  lineCount: number;
  readingCount: number;
  skippedCount: number;
}

@Injectable()
export class FlowFilesService {
  private readonly logger = new Logger(FlowFilesService.name);

  constructor(
    @InjectRepository(FlowFile)
    private readonly flowFileRepository: Repository<FlowFile>,
  ) {}

  /**
   * All imported files, newest first
   */
  async listFlowFiles(): Promise<FlowFileSummary[]> {
    const flowFiles = await this.flowFileRepository.find({
      order: { importedAt: 'DESC', id: 'DESC' },
    });
    return flowFiles.map((flowFile) => this.toSummary(flowFile));
  }

  async getFlowFile(id: number): Promise<FlowFileSummary> {
    const flowFile = await this.flowFileRepository.findOneBy({ id });
    if (!flowFile) {
      throw new NotFoundException(`Flow file ${id} not found`);
    }
    return this.toSummary(flowFile);
  }

  /**
   * Administrative purge. Readings from the file go with it (FK cascade);
   * meter points and meters are shared across files and stay.
   */
  async purgeFlowFile(id: number): Promise<{ id: number; filename: string }> {
    const flowFile = await this.flowFileRepository.findOneBy({ id });
    if (!flowFile) {
      throw new NotFoundException(`Flow file ${id} not found`);
    }

    await this.flowFileRepository.delete({ id });
    this.logger.log(
      `Purged flow file ${flowFile.filename} (${flowFile.readingCount} readings)`,
    );
    return { id, filename: flowFile.filename };
  }

  private toSummary(flowFile: FlowFile): FlowFileSummary {
    return {
      id: flowFile.id,
      filename: flowFile.filename,
      importedAt: flowFile.importedAt,
      lineCount: flowFile.lineCount,
      readingCount: flowFile.readingCount,
      skippedCount: flowFile.skippedCount,
    };
  }
}
