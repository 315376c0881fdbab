import {PolicyBuilder} from '../src/index.js'

const html = `<!doctype html>
<html>
  <head>
    <link rel="stylesheet" href="https://fonts.googleapis.com/css2?family=Inter">
    <script src="https://js.stripe.com/v3/"></script>
    <style>body { margin: 0 }</style>
  </head>
  <body>
    <button onclick="checkout()">Pay</button>
    <script>window.dataLayer = []</script>
  </body>
</html>`

const {csp, inferred} = new PolicyBuilder({
  csp: "default-src 'self'; script-src 'self'",
  includeExternal: true,
  useHeuristics: true,
  modifications: [{action: 'add', directive: 'connect-src', value: 'wss://ws.example.com'}],
})
  .addDocument('index.html', html)
  .generate()

console.log('Content-Security-Policy:', csp)
console.log(`Inferred ${inferred.length} additional origin(s)`)
