import cors from 'cors';
import express, { Express } from 'express';
import { ReportRequestSchema } from './application/dto/ReportRunDTO.js';
import { resolveRequestedPeriod } from './application/services/resolveRequestedPeriod.js';
import { AuthorizationError, ConfigurationError } from './domain/errors/LedgerReportError.js';
import { InvalidPeriodError } from './domain/services/ReportPeriod.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

export const createApp = (container: AppContainer): Express => {
  const app = express();

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Ledger Statements API',
      version: '0.1.0',
      ledgerConfigured: container.hasLiveLedger(),
    });
  });

  app.post('/api/reports', async (req, res) => {
    const parsed = ReportRequestSchema.safeParse(req.body ?? {});

    if (!parsed.success) {
      return res.status(400).json({
        error: 'Invalid report request',
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }

    try {
      const period = resolveRequestedPeriod(parsed.data);
      const report = await container.reportService.runWithCredentialRefresh({
        period,
        beginningCash: parsed.data.beginningCash ?? container.config.app.beginningCash,
        cashFlow: parsed.data.cashFlow,
      });

      return res.json(report);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unable to build statements';

      if (error instanceof InvalidPeriodError) {
        return res.status(400).json({ error: message });
      }

      if (error instanceof AuthorizationError) {
        return res.status(401).json({ error: message, errorClass: error.errorClass });
      }

      if (error instanceof ConfigurationError) {
        return res.status(503).json({ error: message, errorClass: error.errorClass });
      }

      console.error('Report run error:', error);
      return res.status(500).json({ error: message });
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  return app;
};

if (require.main === module) {
  const container = new AppContainer();
  const port = container.config.app.port;

  createApp(container).listen(port, () => {
    console.log(`🚀 Ledger Statements API listening on port ${port}`);
    console.log(`📊 Environment: ${container.config.quickbooks.environment}`);
    console.log(`🎯 Ledger configured: ${container.hasLiveLedger()}`);
  });
}
