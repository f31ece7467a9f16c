import { Request, Response } from 'express';
import { parseWeatherQuery } from '@/middleware/validation.middleware';
import { ReportService } from '@/services/report.service';
import { IReport } from '@/types';

const WEB_SOURCE = 'web';

export class WeatherController {
  constructor(private reportService: ReportService) {}

  async getJson(req: Request, res: Response) {
    const report = await this.build(req);
    res.json(report);
  }

  async getText(req: Request, res: Response) {
    const report = await this.build(req);
    res.type('text/plain').send(report.description);
  }

  private build(req: Request): Promise<IReport> {
    const query = parseWeatherQuery(req.query);
    return this.reportService.buildReport({
      lat: query.lat,
      lon: query.lon,
      includeYesterday: query.yesterday,
      modelOverride: query.model,
      logInteraction: true,
      source: WEB_SOURCE,
    });
  }
}
