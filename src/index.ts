import 'dotenv/config';
import express, { type Express, type Request, type Response } from 'express';
import bodyParser from 'body-parser';
import { getSchemes } from './api/schemes/schemes';
import { getDefaultScenario } from './api/scenario/defaultScenario';
import { updateScenarioField } from './api/scenario/update';
import { calculatePension } from './api/pension/calculate';
import { comparePensionSchemes } from './api/pension/compare';
import { getAssistantTools } from './api/assistant/tools';
import { applyAssistantUpdate } from './api/assistant/update';
import { loadSchemeRules } from './utils/io/schemeRules';
import { log } from './utils/logger';
import { respond } from './utils/net/response';

const app: Express = express();
const port = process.env.PORT || 5002;

// Middleware
app.use(express.json());
app.use(bodyParser.urlencoded({ extended: true }));

// Fail at startup rather than on the first request if the rules file is broken
loadSchemeRules();

// Scheme routes
app.get('/api/schemes', (req: Request, res: Response) => {
  respond(res, () => getSchemes(req));
});

// Scenario routes
app.get('/api/scenario/default', (req: Request, res: Response) => {
  respond(res, () => getDefaultScenario(req));
});

app.post('/api/scenario/update', (req: Request, res: Response) => {
  respond(res, () => updateScenarioField(req));
});

// Pension routes
app.post('/api/pension/calculate', (req: Request, res: Response) => {
  respond(res, () => calculatePension(req));
});

app.post('/api/pension/compare', (req: Request, res: Response) => {
  respond(res, () => comparePensionSchemes(req));
});

// Assistant routes
app.get('/api/assistant/tools', (req: Request, res: Response) => {
  respond(res, () => getAssistantTools(req));
});

app.post('/api/assistant/update', (req: Request, res: Response) => {
  respond(res, () => applyAssistantUpdate(req));
});

// Start server
app.listen(port, () => {
  log(`Server is running on port ${port}`);
});
