// src/app.controller.ts
import { Controller, Get } from '@nestjs/common';

export interface StatusView {
  service: string;
  status: 'ok';
}

/** Liveness probe at the root; no auth, no dependencies. */
@Controller()
export class AppController {
  @Get()
  status(): StatusView {
    return { service: 'warden', status: 'ok' };
  }
}
