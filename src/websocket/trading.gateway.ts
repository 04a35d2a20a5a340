import {
  OnGatewayConnection,
  OnGatewayDisconnect,
  WebSocketGateway,
  WebSocketServer,
} from '@nestjs/websockets';
import { Logger } from '@nestjs/common';
import { Server, Socket } from 'socket.io';
import { LoopStatusMap } from '../scheduler/loop.interface';

@WebSocketGateway({
  cors: {
    origin: '*',
  },
})
export class TradingGateway implements OnGatewayConnection, OnGatewayDisconnect {
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(TradingGateway.name);
  private lastLoopStatus?: LoopStatusMap;

  handleConnection(client: Socket) {
    this.logger.log(`Client connected: ${client.id}`);
    if (this.lastLoopStatus) {
      client.emit('loop-status', this.lastLoopStatus);
    }
  }

  handleDisconnect(client: Socket) {
    this.logger.log(`Client disconnected: ${client.id}`);
  }

  broadcastNotification(text: string) {
    this.server?.emit('notification', { text, timestamp: new Date() });
  }

  broadcastLoopStatus(status: LoopStatusMap) {
    this.lastLoopStatus = status;
    this.server?.emit('loop-status', status);
  }
}
