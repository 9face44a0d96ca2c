import { Controller, Get } from '@nestjs/common'

@Controller()
export class AppController {
  @Get()
  getRoot() {
    return { status: 'ok', service: 'Workout Blocks API' }
  }

  @Get('health')
  health() {
    return { status: 'ok' }
  }
}
