/**
 * Unit tests for the motor monitor task
 */

import type { DeviceHandle, MotorDevice } from '../../src/devices/types';
import { MotorMonitorTask } from '../../src/tasks/motor-monitor/motor-monitor-task';
import { TaskState } from '../../src/tasks/types';
import type { TaskContext } from '../../src/tasks/types';
import { createTaskContext } from '../helpers/fakes';

class FakeMotor implements MotorDevice {
  public moving = false;
  public position = 0;
  public fail = false;

  constructor(
    readonly name: string,
    readonly prefix: string
  ) {}

  async isMoving(): Promise<boolean> {
    if (this.fail) {
      throw new Error('motor record disconnected');
    }
    return this.moving;
  }

  async getPosition(): Promise<number> {
    return this.position;
  }
}

describe('MotorMonitorTask', () => {
  let motorX: FakeMotor;
  let motorY: FakeMotor;
  let context: TaskContext;
  let task: MotorMonitorTask;

  beforeEach(() => {
    motorX = new FakeMotor('motor-x', 'SPARC:CONTROL:MOT01');
    motorY = new FakeMotor('motor-y', 'SPARC:CONTROL:MOT02');
    const devices = new Map<string, DeviceHandle>([
      ['motor-x', motorX],
      ['motor-y', motorY],
      ['camera', { name: 'camera', prefix: 'CAM01:cam1' }],
    ]);

    context = createTaskContext({
      name: 'motors',
      parameters: { mode: 'triggered', settle_delay: 0, motor_names: ['motor-x', 'motor-y', 'camera', 'ghost'] },
      channels: {
        inputs: {},
        outputs: {
          'motor-x_POS': { type: 'float' },
          'motor-x_MOVING': { type: 'int' },
        },
      },
      devices,
    });
    task = new MotorMonitorTask(context);
  });

  afterEach(async () => {
    await task.stop();
  });

  it('publishes position and moving state of configured motors', async () => {
    await task.start();
    motorX.moving = true;
    motorX.position = 12.5;

    await task.tick();

    expect(context.registry.get('SPARC:CONTROL:MOTORS:motor-x_POS').value).toBe(12.5);
    expect(context.registry.get('SPARC:CONTROL:MOTORS:motor-x_MOVING').value).toBe(1);
    expect(task.isMotorMoving('motor-x')).toBe(true);
    expect(task.isMotorMoving('motor-y')).toBe(false);
  });

  it('logs start and stop transitions', async () => {
    await task.start();
    const info = jest.spyOn(context.logger, 'info');

    motorX.moving = true;
    motorX.position = 1;
    await task.tick();
    motorX.moving = false;
    motorX.position = 4;
    await task.tick();

    expect(info.mock.calls.map(([message]) => message)).toEqual([
      'Motor motor-x started moving - Position: 1',
      'Motor motor-x stopped - Final position: 4',
    ]);
    expect(context.registry.get('SPARC:CONTROL:MOTORS:motor-x_MOVING').value).toBe(0);
  });

  it('keeps monitoring other motors when one fails', async () => {
    await task.start();
    motorX.fail = true;
    motorY.moving = true;

    await task.tick();

    expect(task.getState()).toBe(TaskState.INIT);
    expect(task.isMotorMoving('motor-y')).toBe(true);
  });

  it('ignores names that are not motor devices', async () => {
    await task.start();

    expect(task.getState()).toBe(TaskState.INIT);
    expect(task.isMotorMoving('camera')).toBe(false);
    expect(task.isMotorMoving('ghost')).toBe(false);
  });

  it('enters ERROR on invalid parameters', async () => {
    context = createTaskContext({ name: 'motors', parameters: { mode: 'triggered', motor_names: 'motor-x' } });
    task = new MotorMonitorTask(context);

    await task.start();

    expect(task.getState()).toBe(TaskState.ERROR);
  });
});
