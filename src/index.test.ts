import { describe, it, expect, vi, beforeAll } from 'vitest';
import { calculatePension } from './api/pension/calculate';
import { applyAssistantUpdate } from './api/assistant/update';
import { loadSchemeRules } from './utils/io/schemeRules';
import { log } from './utils/logger';
import { ValidationError } from './utils/validate/errors';
import { createMockRequest, createMockResponse } from './utils/test/mockData';

const app = vi.hoisted(() => ({
  use: vi.fn(),
  get: vi.fn(),
  post: vi.fn(),
  listen: vi.fn(),
}));

// Mock all external dependencies
vi.mock('express', () => ({
  default: Object.assign(
    vi.fn(() => app),
    { json: vi.fn(() => 'json-middleware') },
  ),
}));
vi.mock('body-parser', () => ({
  default: { urlencoded: vi.fn(() => 'urlencoded-middleware') },
}));
vi.mock('dotenv/config', () => ({}));
vi.mock('./utils/io/schemeRules');
vi.mock('./utils/logger');
vi.mock('./api/schemes/schemes');
vi.mock('./api/scenario/defaultScenario');
vi.mock('./api/scenario/update');
vi.mock('./api/pension/calculate');
vi.mock('./api/pension/compare');
vi.mock('./api/assistant/tools');
vi.mock('./api/assistant/update');

function routeHandler(method: 'get' | 'post', path: string) {
  const route = app[method].mock.calls.find(([routePath]) => routePath === path);
  if (!route) {
    throw new Error(`No ${method.toUpperCase()} route for ${path}`);
  }
  return route[1];
}

describe('Server', () => {
  beforeAll(async () => {
    delete process.env.PORT;
    await import('./index');
  });

  it('should register the middleware', () => {
    expect(app.use).toHaveBeenCalledWith('json-middleware');
    expect(app.use).toHaveBeenCalledWith('urlencoded-middleware');
  });

  it('should load the scheme rules at startup', () => {
    expect(loadSchemeRules).toHaveBeenCalledTimes(1);
  });

  it('should register every route', () => {
    expect(app.get.mock.calls.map(([path]) => path)).toEqual([
      '/api/schemes',
      '/api/scenario/default',
      '/api/assistant/tools',
    ]);
    expect(app.post.mock.calls.map(([path]) => path)).toEqual([
      '/api/scenario/update',
      '/api/pension/calculate',
      '/api/pension/compare',
      '/api/assistant/update',
    ]);
  });

  it('should listen on the default port', () => {
    expect(app.listen).toHaveBeenCalledWith(5002, expect.any(Function));

    const [, onListen] = app.listen.mock.calls[0];
    onListen();

    expect(log).toHaveBeenCalledWith('Server is running on port 5002');
  });

  it('should send the handler result as JSON', () => {
    const mockRequest = createMockRequest({ body: { scheme: '1995' } });
    const res = createMockResponse();
    const response = { scenario: {}, result: {} };
    vi.mocked(calculatePension).mockReturnValue(response as never);

    routeHandler('post', '/api/pension/calculate')(mockRequest, res);

    expect(calculatePension).toHaveBeenCalledWith(mockRequest);
    expect(res.json).toHaveBeenCalledWith(response);
  });

  it('should answer validation errors with 400', () => {
    const res = createMockResponse();
    vi.mocked(applyAssistantUpdate).mockImplementation(() => {
      throw new ValidationError('arguments', 'Tool arguments must be a JSON object');
    });

    routeHandler('post', '/api/assistant/update')(createMockRequest(), res);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ error: 'Tool arguments must be a JSON object', field: 'arguments' });
  });
});
