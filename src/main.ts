import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'

const DEFAULT_PORT = 3000

async function bootstrap() {
  const app = await NestFactory.create(AppModule)

  app.enableCors({
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  })

  const requested = Number(process.env.PORT ?? DEFAULT_PORT)
  const port = Number.isInteger(requested) && requested > 0 ? requested : DEFAULT_PORT
  await app.listen(port)
  Logger.log(`Listening on port ${port}`, 'Bootstrap')
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err), 'Bootstrap')
  process.exit(1)
})
