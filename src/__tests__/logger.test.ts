import { componentLogger, logLine, logger } from '../logger';

const MESSAGE = Symbol.for('message');

const render = (fields: Record<string, unknown>) => {
  const info = logLine.transform({
    level: 'info',
    message: 'Processing a.jpg',
    timestamp: '10:30:00',
    ...fields,
  });
  return typeof info === 'object' ? info[MESSAGE] : undefined;
};

describe('logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should label each line with its component', () => {
    expect(render({ component: 'Batch' })).toBe('[10:30:00] info [Batch]: Processing a.jpg');
  });

  it('should leave unlabelled lines without a tag', () => {
    expect(render({})).toBe('[10:30:00] info: Processing a.jpg');
  });

  it('should stamp component loggers with their label', () => {
    const write = jest.spyOn(logger, 'write').mockImplementation(() => true);

    componentLogger('Fonts').info('Using Arial');

    expect(write).toHaveBeenCalledWith(
      expect.objectContaining({ level: 'info', message: 'Using Arial', component: 'Fonts' })
    );
  });
});
