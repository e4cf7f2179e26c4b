import { Command } from 'commander'
import { App } from './app.js'
import { renderImpact, renderSummary } from './render.js'

const program = new Command()

program
  .name('svc-catalog')
  .description('Validate and inspect a catalog of service configurations')
  .version('0.1.0')
  .option('--config-dir <dir>', 'Directory holding one <service>.json per service')

function open(): Promise<App> {
  const { configDir } = program.opts<{ configDir?: string }>()
  return App.open(configDir)
}

// svc-catalog validate
program
  .command('validate')
  .description('Validate every service and its dependencies')
  .action(async () => {
    const app = await open()
    const summary = await app.validate()
    for (const line of renderSummary(summary)) console.log(line)
    if (!summary.isSuccessful) process.exitCode = 1
  })

// svc-catalog register --name users --config ./users.json
program
  .command('register')
  .description('Register or replace a service configuration')
  .requiredOption('--name <name>', 'Service name')
  .requiredOption('--config <file>', 'Path to the JSON configuration')
  .action(async (opts: { name: string; config: string }) => {
    const app = await open()
    await app.register(opts.name, opts.config)
    console.log(`Registered ${opts.name}`)
  })

program
  .command('list')
  .description('List registered services')
  .action(async () => {
    const app = await open()
    for (const name of await app.list()) console.log(name)
  })

// svc-catalog order api --stop
program
  .command('order')
  .description('Print the start order (or stop order) for the given services')
  .argument('<roots...>', 'Services to start')
  .option('--stop', 'Print the stop order instead', false)
  .action(async (roots: string[], opts: { stop: boolean }) => {
    const app = await open()
    const order = await app.order(roots, opts.stop)
    order.forEach((name, i) => console.log(`${i + 1}. ${name}`))
  })

program
  .command('impact')
  .description('Show which services depend on a service')
  .argument('<service>', 'Service to analyse')
  .option('--critical', 'Only services that require it through required edges', false)
  .action(async (service: string, opts: { critical: boolean }) => {
    const app = await open()
    for (const line of renderImpact(service, await app.impact(service, opts.critical))) {
      console.log(line)
    }
  })

program
  .command('delete')
  .description('Remove a service from the catalog')
  .argument('<service>', 'Service to remove')
  .option('--force', 'Delete even when other services require it', false)
  .action(async (service: string, opts: { force: boolean }) => {
    const app = await open()
    const impact = await app.delete(service, opts.force)
    console.log(`Deleted ${service}`)
    if (impact.length > 0) console.log(`Affected services: ${impact.join(', ')}`)
  })

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
})
