// src/modules/users/users.module.ts
import { Module } from '@nestjs/common';
import { UserStore } from './user.store';
import { UsersRepository } from './users.repository';

@Module({
  providers: [{ provide: UserStore, useClass: UsersRepository }],
  exports: [UserStore],
})
export class UsersModule {}
