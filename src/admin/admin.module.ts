import { Module } from '@nestjs/common';
import { AdminController } from './admin.controller';
import { AdminService } from './admin.service';
import { AdminAuthorizer } from './admin-capability';
import { AdminGuard } from './guards/admin.guard';
import { OrdersModule } from '../orders/orders.module';
import { InventoryModule } from '../inventory/inventory.module';
import { WalletModule } from '../wallet/wallet.module';

@Module({
  imports: [OrdersModule, InventoryModule, WalletModule],
  controllers: [AdminController],
  providers: [AdminService, AdminAuthorizer, AdminGuard],
  exports: [AdminAuthorizer],
})
export class AdminModule {}
