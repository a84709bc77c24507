import { Module } from "@nestjs/common";

import { TrpcRouter } from "./trpc.router";
import { PcrServicesModule } from "../pcr-services.module";

@Module({
  imports: [PcrServicesModule],
  providers: [TrpcRouter],
  exports: [TrpcRouter],
})
export class TrpcModule {
}
