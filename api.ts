import http from 'http'
import Koa from 'koa'
import Router from 'koa-router'
import bodyParser from 'koa-bodyparser'

import { PairingCompletion, PairingRequest, throwDecoder } from './types'
import { DeviceDriver, DeviceDriverDescriptor } from './plugins'
import { DecodeError, DeviceNotFoundError, TransmissionError, describeError } from './errors'

const errorStatus = (e: unknown) => {
  if (e instanceof DeviceNotFoundError) return 404
  if (e instanceof DecodeError) return 400
  if (e instanceof TransmissionError) return 502
  return 500
}

const commandIdPattern = /^\d+$/

const param = ({ params }: { params: Record<string, unknown> }, name: string): string => {
  const value = params[name]
  if (typeof value !== 'string') throw new DecodeError(`Missing path parameter ${name}`, [])
  return value
}

/**
 * Driver API
 *
 * Exposes a driver descriptor and the drivers it creates over HTTP, for the
 * hub UI and for poking at devices by hand. Drivers are created on first use
 * and kept until the API is closed.
 */
export class DriverApi {
  app = new Koa()
  router = new Router({ prefix: '/api/v1' })
  // in-flight creations are shared, failed ones evicted
  drivers = new Map<string, Promise<DeviceDriver>>()
  server: http.Server | undefined

  constructor(public readonly descriptor: DeviceDriverDescriptor) {
    this.app.use(async (ctx, next) => {
      try {
        await next()
      } catch (e) {
        ctx.status = errorStatus(e)
        ctx.body = { error: describeError(e) }
        if (ctx.status === 500) console.error(`${ctx.method} ${ctx.path} failed:`, e)
      }
    })
    this.app.use(bodyParser())
    this.app.use(this.router.routes()).use(this.router.allowedMethods())

    this.router.get('driver', '/driver', ctx => {
      ctx.body = {
        driverId: descriptor.driverId,
        displayName: descriptor.displayName,
        description: descriptor.description,
        authenticationMethod: descriptor.authenticationMethod,
        requiresPairing: descriptor.requiresPairing,
      }
    })

    this.router.get('devices', '/devices', async ctx => {
      ctx.body = await descriptor.getDevices()
    })

    this.router.get('device', '/devices/:id', async ctx => {
      ctx.body = await descriptor.getDevice(param(ctx, 'id'))
    })

    this.router.get('commands', '/devices/:id/commands', async ctx => {
      const driver = await this.getDriver(param(ctx, 'id'))
      const commands = await driver.getCommands()

      ctx.body = commands.map(({ id, title, icon }) => ({ id, title, icon: icon.toString('base64') }))
    })

    this.router.post('execute', '/devices/:id/commands/:commandId', async ctx => {
      const rawCommandId = param(ctx, 'commandId')
      if (!commandIdPattern.test(rawCommandId))
        throw new DecodeError('Invalid path parameter commandId', [`expected a command id, got "${rawCommandId}"`])

      const driver = await this.getDriver(param(ctx, 'id'))
      const commandId = parseInt(rawCommandId, 10)
      const command = (await driver.getCommands()).find(command => command.id === commandId)

      if (!command) {
        ctx.status = 404
        ctx.body = { error: `No command ${rawCommandId} on device ${driver.deviceId}` }
        return
      }

      this.log(`Executing ${command.title} on ${driver.deviceId}`)
      await driver.execute(command)
      ctx.status = 204
    })

    this.router.get('layout', '/devices/:id/layout', async ctx => {
      const driver = await this.getDriver(param(ctx, 'id'))
      const [width, height] = driver.remoteLayoutSize()

      ctx.body = { width, height, layout: driver.remoteLayout() }
    })

    this.router.get('ready', '/devices/:id/ready', async ctx => {
      const driver = await this.getDriver(param(ctx, 'id'))
      ctx.body = { ready: await driver.isDeviceReady() }
    })

    this.router.post('startPairing', '/pairing', async ctx => {
      const { deviceId, remoteName } = throwDecoder(PairingRequest)(
        ctx.request.body,
        'Unable to decode pairing request',
      )
      const device = await descriptor.getDevice(deviceId)
      const [requestId, deviceProvidesPin] = await descriptor.startPairing(device, remoteName)

      ctx.body = { requestId, deviceProvidesPin }
    })

    this.router.post('finalizePairing', '/pairing/:requestId', async ctx => {
      const { credentials, deviceProvidesPin } = throwDecoder(PairingCompletion)(
        ctx.request.body,
        'Unable to decode pairing completion',
      )

      ctx.body = {
        paired: await descriptor.finalizePairing(param(ctx, 'requestId'), credentials, deviceProvidesPin),
      }
    })
  }

  getDriver(deviceId: string): Promise<DeviceDriver> {
    const existing = this.drivers.get(deviceId)
    if (existing) return existing

    const driver = this.descriptor.createDeviceInstance(deviceId)
    this.drivers.set(deviceId, driver)
    void driver.then(
      () => this.log(`Created driver for ${deviceId}`),
      () => {
        if (this.drivers.get(deviceId) === driver) this.drivers.delete(deviceId)
      },
    )

    return driver
  }

  listen(port: number): Promise<http.Server> {
    return new Promise(resolve => {
      const server = this.app.listen(port, () => resolve(server))
      this.server = server
    })
  }

  async close() {
    const server = this.server
    this.server = undefined
    if (server) await new Promise<void>((resolve, reject) => server.close(e => (e ? reject(e) : resolve())))

    const pending = [...this.drivers.values()]
    this.drivers.clear()

    // creations that failed were already reported to their requests
    for (const result of await Promise.allSettled(pending)) {
      if (result.status === 'fulfilled') await result.value.close()
    }
  }

  log(...args: unknown[]) {
    console.log('[api]', ...args)
  }
}
