import { SceneGraph, ROOT } from '../src';

// Define a node payload
interface Transform {
  name: string;
  x: number;
  y: number;
}

function transform(name: string, x = 0, y = 0): Transform {
  return { name, x, y };
}

// Build a small scene
const scene = new SceneGraph<Transform>(transform('World'));
const player = scene.attachAtRoot(transform('Player', 10, 5));
const weapon = scene.attach(player, transform('Weapon', 1, 0));
scene.attach(weapon, transform('Muzzle', 2, 0));
const camera = scene.attachAtRoot(transform('Camera', 0, 20));

console.log('Scene:');
for (const [parent, node] of scene) {
  console.log(`  ${parent.name} -> ${node.name}`);
}

// Offset every node by its parent (parents are visited first)
for (const [parent, node] of scene.iterMut()) {
  node.value.x += parent.value.x;
  node.value.y += parent.value.y;
}

console.log('\nWorld positions:');
for (const [, node] of scene) {
  console.log(`  ${node.name}: (${node.x}, ${node.y})`);
}

// Hand the weapon to the camera
scene.moveNode(weapon, camera);
console.log('\nCamera children:', Array.from(scene.iterDirectChildren(camera), t => t.name));

// Split the player off into its own scene and splice it back in
const playerScene = scene.detach(player);
if (playerScene) {
  console.log(`\nDetached '${playerScene.root().name}', main scene now has ${scene.size()} nodes`);
  scene.attachGraph(ROOT, playerScene);
}

// Tear down everything under the camera
for (const { value } of scene.iterDetach(camera)) {
  console.log(`Removed ${value.name}`);
}

console.log(`\nFinal node count: ${scene.size()}`);
