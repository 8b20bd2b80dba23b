import { createConsoleEventSink } from '../events';

describe('createConsoleEventSink', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes one JSON line per event at a level matching the event', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const sink = createConsoleEventSink('ap-test');

    sink.record({ type: 'validation_passed', row_count: 3 });
    sink.record({
      type: 'row_failed',
      row: 2,
      serial: 'SN-2',
      mac: 'aa:bb:cc:dd:ee:02',
      site_id: 'site-1',
      error: 'boom',
      code: 'E501'
    });
    sink.record({ type: 'run_completed', site_id: 'site-1', success: 1, failed: 1, total: 2 });

    expect(info).toHaveBeenCalledWith('{"level":"info","service":"ap-test","event":"validation_passed","row_count":3}');
    expect(error).toHaveBeenCalledWith(
      '{"level":"error","service":"ap-test","event":"row_failed","row":2,"serial":"SN-2",' +
        '"mac":"aa:bb:cc:dd:ee:02","site_id":"site-1","error":"boom","code":"E501"}'
    );
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
