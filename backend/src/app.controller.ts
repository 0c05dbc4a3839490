import { Controller, Get } from '@nestjs/common'

@Controller()
export class AppController {
  @Get()
  getRoot() {
    return { status: 'ok', service: 'Training Calendar API' }
  }

  @Get('health')
  health() {
    return { status: 'ok' }
  }
}
