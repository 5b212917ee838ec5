import { EventEmitter } from 'events';
import { spawn } from 'child_process';
import { AppleScriptMessagingService } from '../appleScript.js';
import { SimulatedMessagingService } from '../simulated.js';
import { MessageDeliveryError } from '../../../errors/index.js';

jest.mock('child_process', () => ({
  spawn: jest.fn(),
}));

const mockedSpawn = jest.mocked(spawn);

class FakeChildProcess extends EventEmitter {
  stderr = new EventEmitter();
}

function queueChild(): FakeChildProcess {
  const child = new FakeChildProcess();
  mockedSpawn.mockReturnValueOnce(child as unknown as ReturnType<typeof spawn>);
  return child;
}

beforeEach(() => {
  mockedSpawn.mockReset();
});

describe('AppleScriptMessagingService', () => {
  const service = new AppleScriptMessagingService({
    scriptPath: '/opt/campaign/send_message.applescript',
    timeoutMs: 5000,
  });

  it('runs osascript with the script, phone and text', async () => {
    const child = queueChild();

    const pending = service.sendTextMessage('+15551234567', 'Hi Ana');
    child.emit('close', 0);
    const result = await pending;

    expect(mockedSpawn).toHaveBeenCalledWith(
      'osascript',
      ['/opt/campaign/send_message.applescript', '+15551234567', 'Hi Ana'],
      expect.objectContaining({ stdio: ['ignore', 'ignore', 'pipe'] })
    );
    expect(result.channel).toBe('imessage');
  });

  it('rejects with MessageDeliveryError carrying stderr on non-zero exit', async () => {
    const child = queueChild();

    const pending = service.sendTextMessage('+15551234567', 'Hi Ana');
    child.stderr.emit('data', Buffer.from("execution error: Messages got an error: Can't get participant.\n"));
    child.emit('close', 1);

    await expect(pending).rejects.toThrow(MessageDeliveryError);
    await expect(pending).rejects.toThrow(
      "Message delivery failed: execution error: Messages got an error: Can't get participant."
    );
  });

  it('reports the exit code when stderr is empty', async () => {
    const child = queueChild();

    const pending = service.sendTextMessage('+15551234567', 'Hi Ana');
    child.emit('close', 2);

    await expect(pending).rejects.toThrow('Message delivery failed: osascript exited with code 2');
  });

  it('rejects when osascript cannot be spawned', async () => {
    const child = queueChild();

    const pending = service.sendTextMessage('+15551234567', 'Hi Ana');
    child.emit('error', Object.assign(new Error('spawn osascript ENOENT'), { code: 'ENOENT' }));

    await expect(pending).rejects.toThrow('Could not run osascript: spawn osascript ENOENT');
  });

  it('rejects with a timeout error when the process is aborted', async () => {
    const child = queueChild();
    const abortError = new Error('The operation was aborted');
    abortError.name = 'AbortError';

    const pending = service.sendTextMessage('+15551234567', 'Hi Ana');
    child.emit('error', abortError);
    child.emit('close', null);

    await expect(pending).rejects.toThrow('Message delivery timed out after 5000ms');
  });
});

describe('SimulatedMessagingService', () => {
  it('always succeeds without spawning anything', async () => {
    const service = new SimulatedMessagingService();

    const result = await service.sendTextMessage('+15551234567', 'Hi Ana');

    expect(result.channel).toBe('simulated');
    expect(mockedSpawn).not.toHaveBeenCalled();
  });
});
