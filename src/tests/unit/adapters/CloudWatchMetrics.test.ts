import { CloudWatchClient, PutMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import { CloudWatchMetrics } from '@/adapters/metrics/CloudWatchMetrics';

describe('CloudWatchMetrics', () => {
  function setup() {
    const client = new CloudWatchClient({ region: 'us-east-1' });
    const send = jest.spyOn(client, 'send').mockImplementation(async () => ({ $metadata: {} }));
    const metrics = new CloudWatchMetrics('TestNamespace', client);
    return { send, metrics };
  }

  function batchSizes(calls: unknown[][]): Array<number | undefined> {
    return calls.map(([command]) =>
      command instanceof PutMetricDataCommand ? command.input.MetricData?.length : undefined
    );
  }

  it('should ship buffered datums in batches of at most 20', async () => {
    const { send, metrics } = setup();
    for (let i = 0; i < 45; i++) {
      metrics.incrementCounter('fetch.requests');
    }

    await metrics.flush();

    expect(batchSizes(send.mock.calls)).toEqual([20, 20, 5]);
  });

  it('should send nothing when the buffer is empty', async () => {
    const { send, metrics } = setup();

    await metrics.flush();

    expect(send).not.toHaveBeenCalled();
  });

  it('should tag datums with namespace, unit and dimensions', async () => {
    const { send, metrics } = setup();
    metrics.incrementCounter('fetch.retries', 1, { status: 429 });
    metrics.recordHistogram('etl.run.duration', 1500);

    await metrics.flush();

    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(PutMetricDataCommand);
    if (!(command instanceof PutMetricDataCommand)) return;
    expect(command.input.Namespace).toBe('TestNamespace');
    expect(
      command.input.MetricData?.map(({ MetricName, Value, Unit, Dimensions }) => ({
        MetricName,
        Value,
        Unit,
        Dimensions,
      }))
    ).toEqual([
      {
        MetricName: 'fetch.retries',
        Value: 1,
        Unit: 'Count',
        Dimensions: [{ Name: 'status', Value: '429' }],
      },
      { MetricName: 'etl.run.duration', Value: 1500, Unit: 'Milliseconds', Dimensions: [] },
    ]);
  });

  it('should not fail the caller when CloudWatch rejects the batch', async () => {
    const { send, metrics } = setup();
    send.mockImplementation(async () => {
      throw new Error('throttled');
    });
    metrics.incrementCounter('fetch.requests');

    await expect(metrics.flush()).resolves.toBeUndefined();
  });
});
