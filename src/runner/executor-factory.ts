import type { RemoteExecutor, TransportConfig } from './executor-interface.js';
import { SSMExecutor } from './ssm-executor.js';
import { SSHExecutor } from './ssh-executor.js';

export function createExecutor(transport: TransportConfig): RemoteExecutor {
  switch (transport.type) {
    case 'ssm':
      return new SSMExecutor(transport);
    case 'ssh':
      return new SSHExecutor(transport);
  }
}
