import { ReportRun } from '../dto/ReportRunDTO.js';

export interface StatementRendererPort {
  render(report: ReportRun): Promise<void>;
}
