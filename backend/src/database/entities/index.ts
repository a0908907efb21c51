import { FlowFile } from './flow-file.entity';
import { Meter } from './meter.entity';
import { MeterPoint } from './meter-point.entity';
import { Reading } from './reading.entity';

export { FlowFile, Meter, MeterPoint, Reading };

export const ENTITIES = [FlowFile, MeterPoint, Meter, Reading];
