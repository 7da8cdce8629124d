// src/modules/users/users.module.ts
import { Module } from '@nestjs/common';
import { CREDENTIAL_STORE } from './credential-store';
import { UsersRepository } from './users.repository';

@Module({
  providers: [{ provide: CREDENTIAL_STORE, useClass: UsersRepository }],
  exports: [CREDENTIAL_STORE],
})
export class UsersModule {}
